import {
  CorruptFileError,
  EventStore,
  assertReplicationRoot,
  errnoCode,
  listMachineFiles,
  loadMachineFile,
  recoverJournal,
  resolveMachineId,
  toErrorMessage,
  type CmdtrailConfig,
  type CmdtrailPaths,
} from "@cmdtrail/runtime";

export interface DirectHistory {
  store: EventStore;
  machineId: string;
  files: number;
  corruptFiles: number;
  corruptRecords: number;
  unreadable: Array<{ path: string; error: string }>;
  rootError?: string;
}

async function listOrEmpty(dir: string): Promise<string[]> {
  try {
    return await listMachineFiles(dir);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Builds a store straight from the files on disk, for when no daemon is
 * running. The journal is read without repairing it, since a daemon may
 * still own it.
 */
export async function loadDirectHistory(input: {
  paths: Pick<CmdtrailPaths, "journalPath" | "archiveDir">;
  config: CmdtrailConfig;
}): Promise<DirectHistory> {
  const journal = recoverJournal(input.paths.journalPath, { repair: false });
  const machineId = journal.header?.machine_id ?? resolveMachineId(input.config);
  const store = new EventStore({ machineId });
  const result: DirectHistory = {
    store,
    machineId,
    files: 0,
    corruptFiles: 0,
    corruptRecords: journal.corruptLines,
    unreadable: [],
  };

  const files = await listOrEmpty(input.paths.archiveDir);
  const root = input.config.sync.root;
  if (root !== null) {
    try {
      await assertReplicationRoot(root);
      files.push(...(await listMachineFiles(root)));
    } catch (error) {
      result.rootError = toErrorMessage(error);
    }
  }

  for (const path of files) {
    try {
      const loaded = await loadMachineFile(path);
      store.mergeForeign(loaded.file.machineId, loaded.file.events);
      result.files += 1;
      result.corruptRecords += loaded.corruptRecords;
    } catch (error) {
      if (error instanceof CorruptFileError) {
        result.corruptFiles += 1;
        continue;
      }
      if (errnoCode(error) === "ENOENT") {
        continue;
      }
      result.unreadable.push({ path, error: toErrorMessage(error) });
    }
  }

  store.restoreLocal(journal.events);
  return result;
}
