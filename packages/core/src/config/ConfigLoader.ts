import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/ApimetaError.js';
import { parseGuid } from '../encoding/guid.js';
import { NULL_LOGGER, type Logger } from '../logging/Logger.js';
import { DEFAULT_MAX_INCLUDE_DEPTH } from '../collector/DeclarationCollector.js';
import { DEFAULT_INTERFACE_GUID_TEMPLATE } from '../render/IlRenderer.js';
import { DEFAULT_WIN32_ASSEMBLY } from '../resolution/ilTypes.js';

/**
 * apimeta configuration schema.
 *
 * YAML location: apimeta.config.yaml next to the definition file, or any
 * file passed with --config.
 *
 * Example apimeta.config.yaml:
 *
 * ```yaml
 * # Interface GUIDs: bytes 11 and 13 are replaced by each interface's group and value
 * interfaceGuidTemplate: 23170F69-40C1-278A-0000-000000000000
 *
 * # Reference assembly holding the Win32 metadata types
 * win32Assembly: Windows.Win32.winmd
 *
 * maxIncludeDepth: 32
 * ```
 *
 * Every key is optional; missing keys take their defaults.
 */
export interface ApimetaConfig {
  interfaceGuidTemplate: string;
  win32Assembly: string;
  maxIncludeDepth: number;
}

export const CONFIG_FILE_NAME = 'apimeta.config.yaml';

export const DEFAULT_CONFIG: ApimetaConfig = {
  interfaceGuidTemplate: DEFAULT_INTERFACE_GUID_TEMPLATE,
  win32Assembly: DEFAULT_WIN32_ASSEMBLY,
  maxIncludeDepth: DEFAULT_MAX_INCLUDE_DEPTH,
};

const CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(DEFAULT_CONFIG));

/**
 * Config file used for a definition file when none is given explicitly.
 *
 * @returns the path of apimeta.config.yaml beside the input, if there is one
 */
export function findConfigFile(inputPath: string): string | undefined {
  const candidate = join(dirname(inputPath), CONFIG_FILE_NAME);
  return existsSync(candidate) ? candidate : undefined;
}

/**
 * Load config from a YAML file.
 *
 * Without a path, DEFAULT_CONFIG is returned. A missing file, malformed YAML
 * or an invalid value THROWS ConfigError; unknown keys are only warned about.
 */
export function loadConfig(configPath: string | undefined, logger: Logger = NULL_LOGGER): ApimetaConfig {
  if (configPath === undefined) {
    return DEFAULT_CONFIG;
  }

  if (!existsSync(configPath)) {
    throw new ConfigError(`config file ${configPath} does not exist`, 'ERR_CONFIG_INVALID', { filePath: configPath });
  }

  const config = parseConfig(readFileSync(configPath, 'utf-8'), configPath, logger);
  logger.debug('Loaded config', { path: configPath, ...config });
  return config;
}

/**
 * Parse and validate config text. Exposed for tests and embedders.
 */
export function parseConfig(content: string, sourcePath: string, logger: Logger = NULL_LOGGER): ApimetaConfig {
  let parsed: unknown;
  try {
    parsed = parseYAML(content);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(`failed to parse YAML: ${error.message}`, 'ERR_CONFIG_INVALID', { filePath: sourcePath });
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(
      'config must be a mapping of keys to values',
      'ERR_CONFIG_INVALID',
      { filePath: sourcePath }
    );
  }

  const entries = new Map<string, unknown>(Object.entries(parsed));
  for (const key of entries.keys()) {
    if (!CONFIG_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" ignored`, { file: sourcePath });
    }
  }

  return {
    interfaceGuidTemplate: validateInterfaceGuidTemplate(entries.get('interfaceGuidTemplate'), sourcePath),
    win32Assembly: validateWin32Assembly(entries.get('win32Assembly'), sourcePath),
    maxIncludeDepth: validateMaxIncludeDepth(entries.get('maxIncludeDepth'), sourcePath),
  };
}

/**
 * THROWS unless the value is absent or GUID text.
 */
export function validateInterfaceGuidTemplate(value: unknown, sourcePath: string): string {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.interfaceGuidTemplate;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(
      `interfaceGuidTemplate must be a string, got ${typeof value}`,
      'ERR_CONFIG_INVALID',
      { filePath: sourcePath },
      'Quote the GUID: interfaceGuidTemplate: "23170F69-40C1-278A-0000-000000000000"'
    );
  }
  try {
    parseGuid(value);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(`interfaceGuidTemplate: ${error.message}`, 'ERR_CONFIG_INVALID', { filePath: sourcePath });
  }
  return value;
}

/**
 * THROWS unless the value is absent or an assembly name without spaces or brackets.
 */
export function validateWin32Assembly(value: unknown, sourcePath: string): string {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.win32Assembly;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`win32Assembly must be a string, got ${typeof value}`, 'ERR_CONFIG_INVALID', { filePath: sourcePath });
  }
  if (!/^[A-Za-z0-9_.-]+$/.test(value)) {
    throw new ConfigError(
      `win32Assembly "${value}" is not a valid assembly name`,
      'ERR_CONFIG_INVALID',
      { filePath: sourcePath }
    );
  }
  return value;
}

/**
 * THROWS unless the value is absent or a non-negative integer.
 */
export function validateMaxIncludeDepth(value: unknown, sourcePath: string): number {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.maxIncludeDepth;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(
      `maxIncludeDepth must be a non-negative integer, got ${JSON.stringify(value)}`,
      'ERR_CONFIG_INVALID',
      { filePath: sourcePath }
    );
  }
  return value;
}
