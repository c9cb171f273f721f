export * from "./types";
export { loadConfig, validate, validateConfig, resolveConfigPaths, defaultSchemaPath } from "./loader";
export type { ConfigOverrides } from "./loader";
export { ConfigurationManager, createConfigManager } from "./manager";
export type { ConfigEventLogger, ConfigurationManagerOptions } from "./manager";
