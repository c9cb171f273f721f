export * from "./types";
export * from "./cards";
export * from "./errors";
export * from "./situation";
export * from "./solution";
export * from "./observability";
export * from "./env/validator";
export * from "./env/schema";
export * as config from "./config";
export { ConfigurationManager, createConfigManager } from "./config/manager";
export type { ConfigEventLogger, ConfigurationManagerOptions } from "./config/manager";
export { loadConfig, validateConfig } from "./config/loader";
export type {
  BrokerConfig,
  CacheCompression,
  CacheConfig,
  CanonicalConfig,
  LoggingConfig,
  PostflopStreet,
  SolverConfig,
  SolverDialect,
  SolverRetryConfig,
  StreetBetSizes
} from "./config/types";
