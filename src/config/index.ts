export { DEFAULT_CONFIG_FILE, loadConfig, parseConfig, readConfigFile, resolveConfigPath } from './loader';
export {
  DEFAULT_ITEM_TITLE,
  readConfigFromOnePassword,
  runCommand,
  secretReference,
  storeConfigInOnePassword,
} from './onePassword';
export type { CommandResult, CommandRunner, OnePasswordOptions, StoreConfigOptions } from './onePassword';
