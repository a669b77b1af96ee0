/**
 * Configuration
 *
 * Bind address and logging settings, from a config file and the
 * environment.
 */

export {
  AddressError,
  CONFIG_KEY,
  Config,
  loadConfig,
  parseAddress,
  type ConfigOptions,
} from './config.ts';
