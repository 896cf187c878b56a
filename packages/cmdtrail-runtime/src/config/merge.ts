import { isRecord } from "../utils/json.js";

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = output[key];
    output[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return output;
}
