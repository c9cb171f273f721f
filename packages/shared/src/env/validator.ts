import type { EnvService } from "./schema";
import { ENV_SCHEMAS } from "./schema";

type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends Error {
  constructor(service: EnvService, public readonly missing: string[]) {
    super(`[env] Missing required environment variables for ${service}: ${[...missing].sort().join(", ")}`);
    this.name = "EnvValidationError";
  }
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];

  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined) {
      return true;
    }
    if (schema.allowEmpty?.includes(key)) {
      return false;
    }
    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }
    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(service, source);
  if (missing.length) {
    throw new EnvValidationError(service, missing);
  }
}

/** Reads an optional variable, treating blanks and placeholders as unset. */
export function readOptionalEnv(key: string, source: EnvSource = process.env): string | undefined {
  const value = source[key]?.trim();
  if (!value || PLACEHOLDER_PATTERNS.some(pattern => pattern.test(value))) {
    return undefined;
  }
  return value;
}
