import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import { type CmdtrailConfigFile, CmdtrailConfigFileSchema } from "./schema.js";

let cachedValidator: ValidateFunction<CmdtrailConfigFile> | null = null;

function formatError(error: ErrorObject): string {
  const instancePath = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
  if (error.keyword === "additionalProperties") {
    const params: Record<string, unknown> = error.params;
    const additionalProperty = params.additionalProperty;
    if (typeof additionalProperty === "string" && additionalProperty.length > 0) {
      return `${instancePath}: unknown property "${additionalProperty}"`;
    }
  }
  const message = typeof error.message === "string" && error.message.length > 0 ? error.message : "invalid value";
  return `${instancePath}: ${message}`;
}

function getValidator(): ValidateFunction<CmdtrailConfigFile> {
  if (cachedValidator) return cachedValidator;
  const ajv = new Ajv({
    allErrors: true,
    allowUnionTypes: true,
    strict: false,
  });
  cachedValidator = ajv.compile<CmdtrailConfigFile>(CmdtrailConfigFileSchema);
  return cachedValidator;
}

export interface CmdtrailConfigFileValidationResult {
  ok: boolean;
  errors: string[];
}

export function validateCmdtrailConfigFile(value: unknown): CmdtrailConfigFileValidationResult {
  const validate = getValidator();
  if (validate(value)) return { ok: true, errors: [] };
  return { ok: false, errors: (validate.errors ?? []).map(formatError) };
}
