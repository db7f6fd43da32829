/**
 * @apimeta/core - Definition language compiler for native API metadata
 */

// Error types
export {
  ApimetaError,
  GrammarError,
  ContextError,
  SemanticError,
  RenderError,
  FileAccessError,
  ConfigError,
  locateMessage,
} from './errors/ApimetaError.js';
export type { ErrorContext, ApimetaErrorJSON } from './errors/ApimetaError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  NULL_LOGGER,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export {
  loadConfig,
  parseConfig,
  findConfigFile,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/index.js';
export type { ApimetaConfig } from './config/index.js';

// Parsing
export { parseLine, splitLines } from './parser/lineParser.js';
export type { ParsedLine } from './parser/lineParser.js';
export { FileSourceReader, MemorySourceReader } from './parser/SourceReader.js';
export type { SourceReader } from './parser/SourceReader.js';

// Collection
export { DeclarationCollector, DEFAULT_MAX_INCLUDE_DEPTH } from './collector/DeclarationCollector.js';
export type { CollectorOptions } from './collector/DeclarationCollector.js';
export { DeclarationFactory } from './collector/DeclarationFactory.js';
export {
  parseArgumentAttributes,
  parseByte,
  parseCallingConvention,
  parseDepth,
  parseDirection,
  parseUnsigned,
  parseVariantValue,
} from './collector/fieldParsers.js';
export type { ParsedArgumentAttributes } from './collector/fieldParsers.js';
export { COMMAND_KEYWORDS, COMMAND_SYNTAX, isCommandKeyword } from './collector/commands.js';
export type { CommandKeyword, CommandSyntax } from './collector/commands.js';

// Type resolution
export {
  resolveIlType,
  resolveBaseIlType,
  isComInterfaceName,
  DEFAULT_WIN32_ASSEMBLY,
} from './resolution/ilTypes.js';
export type { TypeResolutionOptions, TypeScope } from './resolution/ilTypes.js';
export { enrichTypeReference } from './resolution/enumEnrichment.js';
export type { EnrichmentScope } from './resolution/enumEnrichment.js';
export { WELL_KNOWN_TYPES, ENUM_BASE_RANGES } from './data/types/wellKnownTypes.js';
export type { WellKnownType } from './data/types/wellKnownTypes.js';

// Attribute blob encoding
export * from './encoding/index.js';

// Rendering
export { renderIl, IlRenderer, DEFAULT_INTERFACE_GUID_TEMPLATE } from './render/IlRenderer.js';
export type { RenderOptions } from './render/IlRenderer.js';

// Pipeline
export { compileFile, compileToFile } from './compile/compile.js';
export type { CompileOptions } from './compile/compile.js';
