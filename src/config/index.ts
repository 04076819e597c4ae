export {
  loadConfiguration,
  validateEnvironment,
  toNestLogLevels,
} from './configuration';
export type { AppConfiguration, AppLogLevel } from './configuration';
