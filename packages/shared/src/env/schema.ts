export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
};

export type EnvService = "cli" | "seed";

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  cli: {
    required: ["BROKER_CONFIG"],
    optional: ["SOLVER_BINARY_PATH", "SOLVER_CACHE_DIR", "BROKER_LOG_LEVEL", "BROKER_SESSION_ID"],
    allowEmpty: ["BROKER_SESSION_ID"]
  },
  seed: {
    required: ["BROKER_CONFIG", "PRECOMPUTED_DIR"],
    optional: ["SOLVER_CACHE_DIR"]
  }
};
