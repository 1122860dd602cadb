export {
  loadEnv,
  type LoadEnvOptions,
  type LogFormatSetting,
  type LogLevelSetting,
  type LoggingEnv,
  type NodeEnv,
} from './env.js';
