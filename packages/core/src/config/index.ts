/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  parseConfig,
  findConfigFile,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  validateInterfaceGuidTemplate,
  validateWin32Assembly,
  validateMaxIncludeDepth,
} from './ConfigLoader.js';
export type { ApimetaConfig } from './ConfigLoader.js';
