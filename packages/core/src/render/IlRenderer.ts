/**
 * IlRenderer - writes the metadata model as ilasm source
 *
 * Output order: module references, assembly references, the assembly and
 * module preamble, one delegate class per function pointer, the `Apis`
 * class (entry points and GUID constants), interfaces, enumerations, structs.
 *
 * Usage:
 *   const il = renderIl(collector.finish(), { win32Assembly: 'Windows.Win32.winmd' });
 */

import type {
  Argument,
  ArgumentDirection,
  Enumeration,
  FunctionPointerType,
  GuidConstant,
  Interface,
  InterfaceMethod,
  FreeFunction,
  ReadonlyMetadataModel,
  Struct,
  TypeReference,
} from '@apimeta/types';
import { ENUM_BASE_RANGES } from '../data/types/wellKnownTypes.js';
import {
  associatedEnumBlob,
  callingConventionBlob,
  countConstBlob,
  countParamBlob,
  formatGuid,
  guidAttributeBlob,
  hexBytes,
  interfaceGuid,
  markerBlob,
  parseGuid,
} from '../encoding/index.js';
import { RenderError } from '../errors/ApimetaError.js';
import { DEFAULT_WIN32_ASSEMBLY, resolveIlType, type TypeResolutionOptions } from '../resolution/ilTypes.js';

export const DEFAULT_INTERFACE_GUID_TEMPLATE = '23170F69-40C1-278A-0000-000000000000';

export interface RenderOptions extends TypeResolutionOptions {
  /** GUID whose bytes 11 and 13 are replaced by each interface's group and value */
  interfaceGuidTemplate: string;
}

const INDENT = '    ';

const DIRECTION_FLAGS: Record<ArgumentDirection, string> = {
  in: '[in] ',
  out: '[out] ',
  inout: '[in] [out] ',
};

const NETSTANDARD_REFERENCE = [
  '.assembly extern netstandard',
  '{',
  `${INDENT}.publickeytoken = ( cc 7b 13 ff cd 2d dd 51 )`,
  `${INDENT}.ver 2:1:0:0`,
  '}',
];

const GUID_ATTRIBUTE_CTOR = 'GuidAttribute::.ctor(uint32, uint16, uint16, uint8, uint8, uint8, uint8, uint8, uint8, uint8, uint8)';

function customAttribute(ctor: string, blob: Uint8Array, comment?: string): string {
  const suffix = comment === undefined ? '' : ` // ${comment}`;
  return `.custom instance void ${ctor} = ( ${hexBytes(blob)} )${suffix}`;
}

function indent(lines: string[], depth = 1): string[] {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => (line === '' ? line : prefix + line));
}

/**
 * Render the model. The model is only read.
 */
export function renderIl(model: ReadonlyMetadataModel, options: Partial<RenderOptions> = {}): string {
  return new IlRenderer(model, {
    win32Assembly: options.win32Assembly ?? DEFAULT_WIN32_ASSEMBLY,
    interfaceGuidTemplate: options.interfaceGuidTemplate ?? DEFAULT_INTERFACE_GUID_TEMPLATE,
  }).render();
}

export class IlRenderer {
  private readonly model: ReadonlyMetadataModel;
  private readonly options: RenderOptions;
  private readonly metadataAttribute: string;
  private readonly interfaceGuidTemplate: Uint8Array;

  constructor(model: ReadonlyMetadataModel, options: RenderOptions) {
    this.model = model;
    this.options = options;
    this.interfaceGuidTemplate = parseGuid(options.interfaceGuidTemplate);
    this.metadataAttribute = `[${options.win32Assembly}]Windows.Win32.Foundation.Metadata`;
  }

  render(): string {
    const sections: string[][] = [
      this.renderPreamble(),
      ...this.model.functionPointers.map((fptr) => this.renderFunctionPointer(fptr)),
      this.renderApis(),
      ...this.model.interfaces.map((iface) => this.renderInterface(iface)),
      ...[...this.model.enums.values()].map((enumeration) => this.renderEnumeration(enumeration)),
      ...this.model.structs.map((struct) => this.renderStruct(struct)),
    ];

    return sections
      .filter((lines) => lines.length > 0)
      .map((lines) => lines.join('\n'))
      .join('\n\n') + '\n';
  }

  private ilType(ref: TypeReference): string {
    return resolveIlType(ref, this.model, this.options);
  }

  private qualified(name: string): string {
    return `${this.model.header.name}.${name}`;
  }

  // === Preamble ===

  private renderPreamble(): string[] {
    const { name, version } = this.model.header;
    const moduleRefs = [...this.model.dlls].sort().map((dll) => `.module extern '${dll}'`);

    return [
      ...moduleRefs,
      ...(moduleRefs.length > 0 ? [''] : []),
      ...NETSTANDARD_REFERENCE,
      `.assembly extern ${this.options.win32Assembly}`,
      '{',
      `${INDENT}.ver 0:0:0:0`,
      '}',
      '',
      `.assembly ${name}.winmd`,
      '{',
      `${INDENT}.ver ${version}`,
      '}',
      '',
      `.module ${name}.winmd`,
      '.imagebase 0x00400000',
      '.file alignment 0x00000200',
      '.stackreserve 0x00100000',
      '.subsystem 0x0003 // WindowsCui',
      '.corflags 0x00000001 // ILOnly',
    ];
  }

  // === Signatures ===

  private renderArgument(arg: Argument): string {
    const optional = arg.optional ? '[opt] ' : '';
    return `${DIRECTION_FLAGS[arg.direction]}${optional}${this.ilType(arg.type)} '${arg.name}'`;
  }

  /**
   * `name (args) suffix` with one argument per line.
   */
  private renderSignature(head: string, args: readonly Argument[], suffix: string): string[] {
    if (args.length === 0) {
      return [`${head} () ${suffix}`];
    }
    return [
      `${head} (`,
      ...indent(args.map((arg, i) => this.renderArgument(arg) + (i < args.length - 1 ? ',' : ''))),
      `) ${suffix}`,
    ];
  }

  /**
   * `.param` directives for arguments that carry attributes. Parameter
   * numbering is 1-based; 0 would be the return value.
   */
  private renderParameterAttributes(args: readonly Argument[]): string[] {
    const lines: string[] = [];

    args.forEach((arg, i) => {
      const attributes: string[] = [];

      if (arg.attributes.has('const')) {
        attributes.push(customAttribute(`${this.metadataAttribute}.ConstAttribute::.ctor()`, markerBlob()));
      }
      if (arg.attributes.has('comOut')) {
        attributes.push(customAttribute(`${this.metadataAttribute}.ComOutPtrAttribute::.ctor()`, markerBlob()));
      }

      const arrayInfo = `${this.metadataAttribute}.NativeArrayInfoAttribute::.ctor()`;
      switch (arg.arraySize.kind) {
        case 'countParam':
          attributes.push(customAttribute(arrayInfo, countParamBlob(arg.arraySize.index), `CountParamIndex = ${arg.arraySize.index}`));
          break;
        case 'countConst':
          attributes.push(customAttribute(arrayInfo, countConstBlob(arg.arraySize.count), `CountConst = ${arg.arraySize.count}`));
          break;
        case 'none':
          break;
      }

      if (arg.type.baseEnum !== undefined) {
        attributes.push(customAttribute(
          `${this.metadataAttribute}.AssociatedEnumAttribute::.ctor(string)`,
          associatedEnumBlob(arg.type.baseEnum),
          arg.type.baseEnum
        ));
      }

      if (attributes.length > 0) {
        lines.push(`.param [${i + 1}]`, ...indent(attributes));
      }
    });

    return lines;
  }

  private renderBody(args: readonly Argument[]): string[] {
    return ['{', ...indent(this.renderParameterAttributes(args)), '}'];
  }

  // === Function pointers ===

  private renderFunctionPointer(fptr: FunctionPointerType): string[] {
    const convention = customAttribute(
      '[netstandard]System.Runtime.InteropServices.UnmanagedFunctionPointerAttribute::.ctor(valuetype [netstandard]System.Runtime.InteropServices.CallingConvention)',
      callingConventionBlob(fptr.callingConventionCode)
    );

    return [
      `.class public auto autochar sealed beforefieldinit ${this.qualified(fptr.name)}`,
      `${INDENT}extends [netstandard]System.MulticastDelegate`,
      '{',
      ...indent([
        convention,
        '',
        '.method public hidebysig specialname rtspecialname',
        `${INDENT}instance void .ctor (object 'object', native int 'method') runtime managed`,
        '{',
        '}',
        '',
        '.method public hidebysig newslot virtual',
        ...indent(this.renderSignature(`instance ${this.ilType(fptr.returnType)} Invoke`, fptr.args, 'runtime managed')),
        ...this.renderBody(fptr.args),
      ]),
      '}',
    ];
  }

  // === Apis ===

  private renderFunction(func: FreeFunction): string[] {
    return [
      `.method public hidebysig pinvokeimpl("${func.dll}" nomangle ${func.callingConvention})`,
      ...indent(this.renderSignature(`${this.ilType(func.returnType)} ${func.name}`, func.args, 'cil managed')),
      ...this.renderBody(func.args),
    ];
  }

  private renderGuidConstant(guid: GuidConstant): string[] {
    return [
      `.field public static valuetype [netstandard]System.Guid '${guid.name}'`,
      customAttribute(`${this.metadataAttribute}.${GUID_ATTRIBUTE_CTOR}`, guidAttributeBlob(guid.bytes), guid.text),
    ];
  }

  private renderApis(): string[] {
    const { functions, guidConstants } = this.model;
    if (functions.length === 0 && guidConstants.length === 0) {
      return [];
    }

    const members = [
      ...functions.map((func) => this.renderFunction(func)),
      ...guidConstants.map((guid) => this.renderGuidConstant(guid)),
    ];

    return [
      `.class public auto autochar abstract sealed beforefieldinit ${this.qualified('Apis')}`,
      `${INDENT}extends [netstandard]System.Object`,
      '{',
      ...indent(members.flatMap((member, i) => (i === 0 ? member : ['', ...member]))),
      '}',
    ];
  }

  // === Interfaces ===

  private renderMethod(method: InterfaceMethod): string[] {
    return [
      '.method public hidebysig newslot abstract virtual',
      ...indent(this.renderSignature(`instance ${this.ilType(method.returnType)} ${method.name}`, method.args, 'cil managed')),
      ...this.renderBody(method.args),
    ];
  }

  private renderInterface(iface: Interface): string[] {
    const guid = interfaceGuid(this.interfaceGuidTemplate, iface.group, iface.value);

    return [
      `.class interface public abstract auto ansi ${this.qualified(iface.name)}`,
      `${INDENT}implements ${this.ilType(iface.baseType)}`,
      '{',
      ...indent([
        customAttribute(`${this.metadataAttribute}.${GUID_ATTRIBUTE_CTOR}`, guidAttributeBlob(guid), formatGuid(guid)),
        ...iface.methods.flatMap((method) => ['', ...this.renderMethod(method)]),
      ]),
      '}',
    ];
  }

  // === Enumerations ===

  private renderEnumeration(enumeration: Enumeration): string[] {
    const baseType = this.ilType(enumeration.baseType);
    const range = ENUM_BASE_RANGES.get(baseType);
    if (!range) {
      throw new RenderError(
        `enumeration ${enumeration.name}: base type ${enumeration.baseType.name} (${baseType}) is not an integer type`,
        'ERR_ENUM_BASE_TYPE',
        { enumeration: enumeration.name },
        'Use one of INT8..UINT64 or a Win32 integer alias such as DWORD'
      );
    }

    const literals = [...enumeration.variants.values()].map((variant) => {
      if (variant.value < range.min || variant.value > range.max) {
        throw new RenderError(
          `enumeration ${enumeration.name}: variant ${variant.name} = ${variant.value} does not fit in ${baseType}`,
          'ERR_VARIANT_RANGE',
          { enumeration: enumeration.name, variant: variant.name }
        );
      }
      return `.field public static literal valuetype ${this.qualified(enumeration.name)} ${variant.name} = ${baseType}(${variant.value})`;
    });

    return [
      `.class public auto ansi sealed ${this.qualified(enumeration.name)}`,
      `${INDENT}extends [netstandard]System.Enum`,
      '{',
      ...indent([
        ...(enumeration.isFlags
          ? [customAttribute('[netstandard]System.FlagsAttribute::.ctor()', markerBlob())]
          : []),
        `.field public specialname rtspecialname ${baseType} value__`,
        ...literals,
      ]),
      '}',
    ];
  }

  // === Structs ===

  private renderStruct(struct: Struct): string[] {
    return [
      `.class public sequential ansi sealed beforefieldinit ${this.qualified(struct.name)}`,
      `${INDENT}extends [netstandard]System.ValueType`,
      '{',
      ...indent(struct.fields.map((field) => `.field public ${this.ilType(field.type)} '${field.name}'`)),
      '}',
    ];
  }
}
