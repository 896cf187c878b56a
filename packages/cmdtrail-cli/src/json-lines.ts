export type JsonLineWritable = {
  write(
    chunk: string,
    callback?: (error?: Error | null) => void,
  ): boolean;
};

function writeChunk(
  output: JsonLineWritable,
  chunk: string,
): Promise<void> {
  return new Promise<void>((resolveWrite, rejectWrite) => {
    output.write(chunk, (error?: Error | null) => {
      if (error) {
        rejectWrite(error);
        return;
      }
      resolveWrite();
    });
  });
}

/** Serializes writes so output keeps its order and a failed write stops the rest. */
export class JsonLineWriter {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly output: JsonLineWritable = process.stdout,
  ) {}

  write(chunk: string): void {
    this.queue = this.queue.then(() => writeChunk(this.output, chunk));
  }

  writeLine(line: string): void {
    this.write(`${line}\n`);
  }

  async flush(): Promise<void> {
    await this.queue;
  }
}

export async function writeJsonLine(
  value: unknown,
  output: JsonLineWritable = process.stdout,
): Promise<void> {
  const encoded = JSON.stringify(value);
  if (encoded === undefined) return;
  await writeChunk(output, `${encoded}\n`);
}

export async function writeLine(
  line: string,
  output: JsonLineWritable = process.stdout,
): Promise<void> {
  await writeChunk(output, `${line}\n`);
}
