/**
 * Compile pipeline: definition file -> metadata model -> IL text
 *
 * The whole input is collected and rendered before anything is written, and
 * the output goes to a sibling temporary file that is renamed into place.
 * A failed run leaves no output file behind.
 */

import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import type { ReadonlyMetadataModel } from '@apimeta/types';
import { DeclarationCollector } from '../collector/DeclarationCollector.js';
import { DEFAULT_CONFIG, type ApimetaConfig } from '../config/ConfigLoader.js';
import { FileAccessError } from '../errors/ApimetaError.js';
import { NULL_LOGGER, type Logger } from '../logging/Logger.js';
import type { SourceReader } from '../parser/SourceReader.js';
import { renderIl } from '../render/IlRenderer.js';

export interface CompileOptions {
  config?: ApimetaConfig;
  logger?: Logger;
  /** Defaults to the file system */
  reader?: SourceReader;
}

function summarize(model: ReadonlyMetadataModel): Record<string, number> {
  return {
    dlls: model.dlls.size,
    functions: model.functions.length,
    functionPointers: model.functionPointers.length,
    interfaces: model.interfaces.length,
    enums: model.enums.size,
    structs: model.structs.length,
    guidConstants: model.guidConstants.length,
  };
}

/**
 * Collect a definition file (with its includes) and render it.
 */
export function compileFile(inputPath: string, options: CompileOptions = {}): string {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? NULL_LOGGER;

  const collector = new DeclarationCollector({
    reader: options.reader,
    logger,
    win32Assembly: config.win32Assembly,
    maxIncludeDepth: config.maxIncludeDepth,
  });

  logger.debug(`Collecting declarations from ${inputPath}`);
  collector.collectFile(inputPath);
  const model = collector.finish();
  logger.info(`Collected ${model.header.name} ${model.header.version}`, summarize(model));

  return renderIl(model, {
    win32Assembly: config.win32Assembly,
    interfaceGuidTemplate: config.interfaceGuidTemplate,
  });
}

/**
 * Compile `inputPath` and write the IL to `outputPath`.
 */
export function compileToFile(inputPath: string, outputPath: string, options: CompileOptions = {}): void {
  const logger = options.logger ?? NULL_LOGGER;
  const il = compileFile(inputPath, options);

  const target = resolve(outputPath);
  const temporary = `${target}.tmp`;
  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(temporary, il, 'utf-8');
    renameSync(temporary, target);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    if (existsSync(temporary)) {
      rmSync(temporary, { force: true });
    }
    throw new FileAccessError(
      `cannot write output: ${error.message}`,
      'ERR_FILE_UNWRITABLE',
      { filePath: outputPath }
    );
  }

  logger.info(`Wrote ${outputPath}`, { bytes: Buffer.byteLength(il, 'utf-8') });
}
