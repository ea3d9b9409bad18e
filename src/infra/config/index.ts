export { parseEnv, createConfig, type Env, type AppConfig } from './env.js';
