/**
 * DeclarationFactory - validated construction of model entities
 *
 * Every check that does not depend on collector state lives here, so entities
 * built outside the collector (tests, embedders) obey the same rules.
 */

import type {
  Enumeration,
  EnumVariant,
  GuidConstant,
  Interface,
  TypeReference,
} from '@apimeta/types';
import { SemanticError, type ErrorContext } from '../errors/ApimetaError.js';
import { formatGuid, parseGuid } from '../encoding/guid.js';

export class DeclarationFactory {
  static typeReference(name: string, depth: number, context: ErrorContext = {}): TypeReference {
    if (!Number.isInteger(depth) || depth < 0) {
      throw new SemanticError(`invalid pointer depth ${depth} for type ${name}`, 'ERR_INVALID_DEPTH', context);
    }
    return { name, depth };
  }

  static interface(
    name: string,
    group: number,
    value: number,
    baseType: TypeReference,
    context: ErrorContext = {}
  ): Interface {
    for (const [label, byte] of [['group', group], ['value', value]] as const) {
      if (!Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
        throw new SemanticError(
          `interface ${name}: ${label} must be between 0 and 255, got ${byte}`,
          'ERR_BYTE_RANGE',
          context
        );
      }
    }
    return { name, group, value, baseType, methods: [] };
  }

  static enumeration(
    name: string,
    baseType: TypeReference,
    isFlags: boolean,
    context: ErrorContext = {}
  ): Enumeration {
    if (baseType.depth !== 0) {
      throw new SemanticError(
        `enumeration ${name}: base type ${baseType.name} must not be a pointer`,
        'ERR_ENUM_BASE_POINTER',
        context
      );
    }
    return { name, baseType, isFlags, variants: new Map() };
  }

  /**
   * Append a variant, rejecting a name the enumeration already has.
   */
  static addVariant(
    enumeration: Enumeration,
    name: string,
    value: bigint,
    context: ErrorContext = {}
  ): EnumVariant {
    if (enumeration.variants.has(name)) {
      throw new SemanticError(
        `enumeration ${enumeration.name} already has a variant named ${name}`,
        'ERR_DUPLICATE_VARIANT',
        context
      );
    }
    const variant: EnumVariant = { name, value };
    enumeration.variants.set(name, variant);
    return variant;
  }

  static guidConstant(name: string, text: string, context: ErrorContext = {}): GuidConstant {
    const bytes = parseGuid(text, context);
    return { name, bytes, text: formatGuid(bytes) };
  }
}
