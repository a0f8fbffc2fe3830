export {
  EnvSchema,
  parseEnv,
  parseMentions,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
