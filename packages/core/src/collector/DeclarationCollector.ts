/**
 * DeclarationCollector - builds the metadata model from definition files
 *
 * Reads declarations line by line and keeps a "current" slot for each kind
 * of enclosing declaration: `arg` attaches to the current function-like
 * entity, `meth` to the current interface, `variant` to the current
 * enumeration, `field` to the current struct, `fn` uses the current DLL.
 * A command whose slot is empty fails with a ContextError.
 *
 * `include` expands another file in place, depth first, with the slots
 * carried across the file boundary in both directions.
 *
 * The first error aborts collection; there is no partial model.
 */

import {
  CALLING_CONVENTION_CODES,
  RESULT_CODE_TYPE,
  type Argument,
  type Enumeration,
  type FreeFunction,
  type FunctionLike,
  type FunctionPointerType,
  type Interface,
  type InterfaceMethod,
  type MetadataHeader,
  type MetadataModel,
  type Struct,
  type TypeReference,
} from '@apimeta/types';
import {
  ContextError,
  GrammarError,
  RenderError,
  SemanticError,
  type ErrorContext,
} from '../errors/ApimetaError.js';
import { NULL_LOGGER, type Logger } from '../logging/Logger.js';
import { parseLine, type ParsedLine } from '../parser/lineParser.js';
import { FileSourceReader, type SourceReader } from '../parser/SourceReader.js';
import { enrichTypeReference } from '../resolution/enumEnrichment.js';
import { DEFAULT_WIN32_ASSEMBLY, type TypeResolutionOptions } from '../resolution/ilTypes.js';
import { COMMAND_KEYWORDS, COMMAND_SYNTAX, isCommandKeyword, type CommandKeyword } from './commands.js';
import { DeclarationFactory } from './DeclarationFactory.js';
import {
  parseArgumentAttributes,
  parseByte,
  parseCallingConvention,
  parseDepth,
  parseDirection,
  parseVariantValue,
} from './fieldParsers.js';

export const DEFAULT_MAX_INCLUDE_DEPTH = 32;

export interface CollectorOptions {
  /** Defaults to the file system */
  reader?: SourceReader;
  logger?: Logger;
  /** Reference assembly of the Win32 metadata types, used to spell well-known types */
  win32Assembly?: string;
  /** How many includes may be nested inside the top-level file */
  maxIncludeDepth?: number;
}

/**
 * The "current" declarations commands attach to. Each slot is set by its
 * declaring command and stays until replaced; only `functionLike` changes
 * whenever a new function, function pointer or method begins.
 */
interface CollectorContext {
  header?: MetadataHeader;
  dll?: string;
  functionLike?: FunctionLike;
  interface?: Interface;
  enumeration?: Enumeration;
  struct?: Struct;
}

type ContextSlot = keyof CollectorContext;

/** Declarations that fill each slot, for error messages */
const SLOT_DECLARATIONS: Record<ContextSlot, string> = {
  header: '"meta"',
  dll: '"dll"',
  functionLike: '"fn", "fptr" or "meth"',
  interface: '"iface"',
  enumeration: '"enum" or "flags"',
  struct: '"struct"',
};

interface SourceLocation extends ErrorContext {
  filePath: string;
  lineNumber: number;
}

export class DeclarationCollector {
  private readonly reader: SourceReader;
  private readonly logger: Logger;
  private readonly typeOptions: TypeResolutionOptions;
  private readonly maxIncludeDepth: number;

  private model: MetadataModel | undefined;
  private readonly context: CollectorContext = {};
  /** Resolved paths of the files being read, outermost first */
  private readonly includeStack: string[] = [];

  constructor(options: CollectorOptions = {}) {
    this.reader = options.reader ?? new FileSourceReader();
    this.logger = options.logger ?? NULL_LOGGER;
    this.typeOptions = { win32Assembly: options.win32Assembly ?? DEFAULT_WIN32_ASSEMBLY };
    this.maxIncludeDepth = options.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
  }

  /**
   * Collect the declarations of a top-level definition file.
   */
  collectFile(path: string): void {
    this.collectResolved(this.reader.resolve(path));
  }

  /**
   * The collected model. Fails when no `meta` declaration was seen.
   */
  finish(): MetadataModel {
    if (this.model === undefined) {
      throw new RenderError(
        'nothing to render: no "meta" declaration was collected',
        'ERR_NO_HEADER',
        {},
        'Start the definition file with: meta<TAB>NAME<TAB>VERSION'
      );
    }
    return this.model;
  }

  private collectResolved(path: string): void {
    this.includeStack.push(path);
    try {
      const lines = this.reader.readLines(path);
      for (let i = 0; i < lines.length; i++) {
        const parsed = parseLine(lines[i]);
        if (parsed !== null) {
          this.dispatch(parsed, { filePath: path, lineNumber: i + 1 });
        }
      }
    } finally {
      this.includeStack.pop();
    }
  }

  private dispatch(parsed: ParsedLine, at: SourceLocation): void {
    const { command, fields } = parsed;

    if (!isCommandKeyword(command)) {
      throw new GrammarError(
        `unknown command "${command}"`,
        'ERR_UNKNOWN_COMMAND',
        at,
        `Known commands: ${COMMAND_KEYWORDS.join(', ')}`
      );
    }

    const model = this.model;
    if (command !== 'meta' && model === undefined) {
      throw new ContextError(
        `"${command}" before any "meta" declaration; the first declaration must be "meta"`,
        'header',
        at
      );
    }

    const syntax = COMMAND_SYNTAX[command];
    if (fields.length < syntax.minFields || fields.length > syntax.maxFields) {
      throw new GrammarError(
        `wrong number of fields for "${command}" (got ${fields.length}); usage: ${syntax.usage}`,
        'ERR_FIELD_COUNT',
        at,
        'Fields are separated by tab characters'
      );
    }

    this.logger.trace(`${command} ${fields.join(' ')}`, { file: at.filePath, line: at.lineNumber });

    if (model === undefined) {
      this.declareHeader(fields, at);
      return;
    }
    this.dispatchDeclaration(command, fields, model, at);
  }

  private dispatchDeclaration(
    command: CommandKeyword,
    fields: string[],
    model: MetadataModel,
    at: SourceLocation
  ): void {
    switch (command) {
      case 'meta':
        throw new SemanticError(
          `duplicate "meta" declaration; ${model.header.name} ${model.header.version} is already declared`,
          'ERR_DUPLICATE_HEADER',
          at
        );
      case 'fptr':
        return this.declareFunctionPointer(fields, model, at);
      case 'dll':
        return this.declareDll(fields, model);
      case 'fn':
        return this.declareFunction(fields, model, at);
      case 'arg':
        return this.declareArgument(fields, false, model, at);
      case 'optarg':
        return this.declareArgument(fields, true, model, at);
      case 'iface':
        return this.declareInterface(fields, model, at);
      case 'meth':
        return this.declareMethod(fields, model, at);
      case 'stdmeth':
        return this.declareStandardMethod(fields, model, at);
      case 'include':
        return this.includeFile(fields[0], at);
      case 'enum':
        return this.declareEnumeration(fields, false, model, at);
      case 'flags':
        return this.declareEnumeration(fields, true, model, at);
      case 'variant':
        return this.declareVariant(fields, at);
      case 'struct':
        return this.declareStruct(fields, model);
      case 'field':
        return this.declareField(fields, at);
      case 'guid':
        return this.declareGuid(fields, model, at);
    }
  }

  // === Context ===

  private require<T>(value: T | undefined, slot: ContextSlot, command: CommandKeyword, at: SourceLocation): T {
    if (value === undefined) {
      throw new ContextError(
        `"${command}" without a preceding ${SLOT_DECLARATIONS[slot]} declaration`,
        slot,
        at
      );
    }
    return value;
  }

  /**
   * Build a type reference from a name and depth field and enrich it.
   */
  private typeReference(name: string, depthText: string, model: MetadataModel, at: SourceLocation): TypeReference {
    const ref = DeclarationFactory.typeReference(name, parseDepth(depthText, at), at);
    const linked = enrichTypeReference(ref, model, this.typeOptions);
    if (linked) {
      this.logger.debug(`Linked type ${name} to enumeration ${linked.name}`, {
        file: at.filePath,
        line: at.lineNumber,
      });
    }
    return ref;
  }

  // === Declarations ===

  private declareHeader([name, version]: string[], at: SourceLocation): void {
    this.model = {
      header: { name, version },
      functions: [],
      functionPointers: [],
      interfaces: [],
      enums: new Map(),
      structs: [],
      guidConstants: [],
      dlls: new Set(),
    };
    this.context.header = this.model.header;
    this.logger.debug(`Metadata ${name} ${version}`, { file: at.filePath, line: at.lineNumber });
  }

  private declareFunctionPointer(
    [name, returnType, returnDepth, callConv]: string[],
    model: MetadataModel,
    at: SourceLocation
  ): void {
    const convention = callConv === undefined ? 'winapi' : parseCallingConvention(callConv, at);
    const fptr: FunctionPointerType = {
      kind: 'functionPointer',
      name,
      returnType: this.typeReference(returnType, returnDepth, model, at),
      args: [],
      callingConventionCode: CALLING_CONVENTION_CODES[convention],
    };
    model.functionPointers.push(fptr);
    this.context.functionLike = fptr;
  }

  private declareDll([name]: string[], model: MetadataModel): void {
    this.context.dll = name;
    model.dlls.add(name.toLowerCase());
  }

  private declareFunction(
    [name, returnType, returnDepth, callConv]: string[],
    model: MetadataModel,
    at: SourceLocation
  ): void {
    const dll = this.require(this.context.dll, 'dll', 'fn', at);
    const func: FreeFunction = {
      kind: 'function',
      name,
      dll,
      callingConvention: callConv === undefined ? 'winapi' : parseCallingConvention(callConv, at),
      returnType: this.typeReference(returnType, returnDepth, model, at),
      args: [],
    };
    model.functions.push(func);
    this.context.functionLike = func;
  }

  private declareArgument(
    [directionText, name, type, depth, attributeText]: string[],
    optional: boolean,
    model: MetadataModel,
    at: SourceLocation
  ): void {
    const command = optional ? 'optarg' : 'arg';
    const owner = this.require(this.context.functionLike, 'functionLike', command, at);
    const direction = parseDirection(directionText, at);
    const { attributes, arraySize } = parseArgumentAttributes(attributeText ?? '', at);

    const argument: Argument = {
      name,
      type: this.typeReference(type, depth, model, at),
      direction,
      optional,
      attributes,
      arraySize,
    };
    owner.args.push(argument);
  }

  private declareInterface(
    [name, groupText, valueText, baseType]: string[],
    model: MetadataModel,
    at: SourceLocation
  ): void {
    const iface = DeclarationFactory.interface(
      name,
      parseByte(groupText, 'group', at),
      parseByte(valueText, 'value', at),
      DeclarationFactory.typeReference(baseType, 0, at),
      at
    );
    model.interfaces.push(iface);
    this.context.interface = iface;
  }

  private declareMethod([name, returnType, returnDepth]: string[], model: MetadataModel, at: SourceLocation): void {
    const iface = this.require(this.context.interface, 'interface', 'meth', at);
    const method: InterfaceMethod = {
      kind: 'method',
      name,
      returnType: this.typeReference(returnType, returnDepth, model, at),
      args: [],
    };
    iface.methods.push(method);
    this.context.functionLike = method;
  }

  /**
   * `stdmeth NAME`: an argument-less method returning HRESULT. Nothing may
   * attach to it, so the function-like slot is cleared.
   */
  private declareStandardMethod([name]: string[], model: MetadataModel, at: SourceLocation): void {
    const iface = this.require(this.context.interface, 'interface', 'stdmeth', at);
    iface.methods.push({
      kind: 'method',
      name,
      returnType: this.typeReference(RESULT_CODE_TYPE, '0', model, at),
      args: [],
    });
    this.context.functionLike = undefined;
  }

  private includeFile(path: string, at: SourceLocation): void {
    const resolved = this.reader.resolve(path, at.filePath);

    if (this.includeStack.includes(resolved)) {
      throw new SemanticError(
        `include cycle: ${[...this.includeStack, resolved].join(' -> ')}`,
        'ERR_INCLUDE_CYCLE',
        at
      );
    }
    if (this.includeStack.length > this.maxIncludeDepth) {
      throw new SemanticError(
        `includes nested deeper than ${this.maxIncludeDepth} levels`,
        'ERR_INCLUDE_DEPTH',
        at,
        'Raise maxIncludeDepth in apimeta.config.yaml if the nesting is intended'
      );
    }

    this.logger.debug(`Including ${resolved}`, { file: at.filePath, line: at.lineNumber });
    this.collectResolved(resolved);
  }

  private declareEnumeration(
    [name, baseType]: string[],
    isFlags: boolean,
    model: MetadataModel,
    at: SourceLocation
  ): void {
    if (model.enums.has(name)) {
      throw new SemanticError(`duplicate enumeration ${name}`, 'ERR_DUPLICATE_ENUM', at);
    }
    const enumeration = DeclarationFactory.enumeration(
      name,
      DeclarationFactory.typeReference(baseType, 0, at),
      isFlags,
      at
    );
    model.enums.set(name, enumeration);
    this.context.enumeration = enumeration;
  }

  private declareVariant([name, valueText]: string[], at: SourceLocation): void {
    const enumeration = this.require(this.context.enumeration, 'enumeration', 'variant', at);
    DeclarationFactory.addVariant(enumeration, name, parseVariantValue(valueText, at), at);
  }

  private declareStruct([name]: string[], model: MetadataModel): void {
    const struct: Struct = { name, fields: [] };
    model.structs.push(struct);
    this.context.struct = struct;
  }

  /**
   * Struct fields are not enum-enriched: the field keeps its declared type.
   */
  private declareField([name, type, depth]: string[], at: SourceLocation): void {
    const struct = this.require(this.context.struct, 'struct', 'field', at);
    struct.fields.push({ name, type: DeclarationFactory.typeReference(type, parseDepth(depth, at), at) });
  }

  private declareGuid([name, text]: string[], model: MetadataModel, at: SourceLocation): void {
    model.guidConstants.push(DeclarationFactory.guidConstant(name, text, at));
  }
}
