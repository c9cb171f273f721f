import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import { ConfigurationError } from "../errors";
import type { BrokerConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(__dirname, "../../../../config/schema/broker-config.schema.json");

function compileSchema(schemaFilePath: string) {
  const schemaRaw = fs.readFileSync(schemaFilePath, "utf-8");
  const schema: unknown = JSON.parse(schemaRaw);
  if (!isSchemaObject(schema)) {
    throw new ConfigurationError(`Schema at ${schemaFilePath} is not a JSON object`, "schema");
  }
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return { ajv, validateFn: ajv.compile(schema) };
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates config and returns structured result without throwing.
 * @param schemaFilePath - Path to JSON schema file
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const { validateFn } = compileSchema(schemaFilePath);
  const valid = validateFn(config);
  if (!valid) {
    const errors = validateFn.errors?.map(err => `${err.instancePath} ${err.message}`) || [];
    return { valid: false, errors };
  }
  return { valid: true };
}

export function validate(config: unknown, schemaFilePath: string = defaultSchemaPath): asserts config is BrokerConfig {
  const { ajv, validateFn } = compileSchema(schemaFilePath);
  const valid = validateFn(config);
  if (!valid) {
    const msg = ajv.errorsText(validateFn.errors, { separator: "\n" });
    throw new ConfigurationError(`Config validation failed:\n${msg}`, "config");
  }
}

export interface ConfigOverrides {
  binaryPath?: string;
  cacheDirectory?: string;
}

/**
 * Reads, validates and resolves a broker config. Relative binary and cache
 * paths are resolved against the config file's directory.
 */
export function loadConfig(
  filePath: string,
  schemaFilePath: string = defaultSchemaPath,
  overrides: ConfigOverrides = {}
): BrokerConfig {
  const raw = fs.readFileSync(filePath, "utf-8");
  const cfg: unknown = JSON.parse(raw);
  validate(cfg, schemaFilePath);
  return resolveConfigPaths(cfg, path.dirname(path.resolve(filePath)), overrides);
}

export function resolveConfigPaths(config: BrokerConfig, baseDir: string, overrides: ConfigOverrides = {}): BrokerConfig {
  const binaryPath = overrides.binaryPath ?? config.solver.binaryPath;
  const cacheDirectory = overrides.cacheDirectory ?? config.cache.directory;
  return {
    ...config,
    solver: { ...config.solver, binaryPath: path.resolve(baseDir, binaryPath) },
    cache: { ...config.cache, directory: path.resolve(baseDir, cacheDirectory) }
  };
}
