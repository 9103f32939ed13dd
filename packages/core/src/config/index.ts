export {
  ConfigError,
  expandEnvInString,
  expandEnvVars,
  type EnvExpansionOptions,
} from './env.js';
