export {
  DEFAULT_ENGINE_CONFIG,
  engineConfigSchema,
  lexicalWeightsSchema,
  resolveEngineConfig,
  fieldErrors,
} from "./engine-config.js";
export type { EngineConfigInput } from "./engine-config.js";
export { envSchema, parseEnv } from "./env.js";
