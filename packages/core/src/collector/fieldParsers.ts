/**
 * Field parsers - turn the text of a declaration field into model values
 */

import {
  ARGUMENT_DIRECTIONS,
  CALLING_CONVENTIONS,
  type ArgumentAttribute,
  type ArgumentDirection,
  type ArraySize,
  type CallingConvention,
} from '@apimeta/types';
import { GrammarError, SemanticError, type ErrorContext } from '../errors/ApimetaError.js';

const COUNT_PARAM_PATTERN = /^ca([0-9]+)$/;
const COUNT_CONST_PATTERN = /^cc([0-9]+)$/;

/** Encoded in 2 bytes */
const MAX_COUNT_PARAM_INDEX = 0xFFFF;
/** Encoded in 4 bytes */
const MAX_COUNT_CONST = 0xFFFFFFFF;

/**
 * Non-negative decimal integer
 */
export function parseUnsigned(text: string, label: string, code: string, context: ErrorContext): number {
  if (!/^[0-9]+$/.test(text)) {
    throw new SemanticError(`${label} must be a non-negative decimal integer, got "${text}"`, code, context);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new SemanticError(`${label} ${text} is too large`, code, context);
  }
  return value;
}

export function parseDepth(text: string, context: ErrorContext): number {
  return parseUnsigned(text, 'pointer depth', 'ERR_INVALID_DEPTH', context);
}

/**
 * Interface group or value byte, 0..255
 */
export function parseByte(text: string, label: string, context: ErrorContext): number {
  const value = parseUnsigned(text, label, 'ERR_INVALID_NUMBER', context);
  if (value > 0xFF) {
    throw new SemanticError(`${label} must be between 0 and 255, got ${value}`, 'ERR_BYTE_RANGE', context);
  }
  return value;
}

/**
 * Enumeration variant value: decimal or 0x-prefixed hexadecimal, optionally negative
 */
export function parseVariantValue(text: string, context: ErrorContext): bigint {
  const match = /^(-?)(0[xX][0-9A-Fa-f]+|[0-9]+)$/.exec(text);
  if (!match) {
    throw new SemanticError(`variant value must be an integer, got "${text}"`, 'ERR_INVALID_NUMBER', context);
  }
  const magnitude = BigInt(match[2]);
  return match[1] === '-' ? -magnitude : magnitude;
}

export function parseDirection(text: string, context: ErrorContext): ArgumentDirection {
  const direction = ARGUMENT_DIRECTIONS.find((candidate) => candidate === text);
  if (direction === undefined) {
    throw new GrammarError(
      `unknown argument direction "${text}"`,
      'ERR_UNKNOWN_DIRECTION',
      context,
      `Use one of: ${ARGUMENT_DIRECTIONS.join(', ')}`
    );
  }
  return direction;
}

export function parseCallingConvention(text: string, context: ErrorContext): CallingConvention {
  const convention = CALLING_CONVENTIONS.find((candidate) => candidate === text);
  if (convention === undefined) {
    throw new GrammarError(
      `unknown calling convention "${text}"`,
      'ERR_UNKNOWN_CALLING_CONVENTION',
      context,
      `Use one of: ${CALLING_CONVENTIONS.join(', ')}`
    );
  }
  return convention;
}

export interface ParsedArgumentAttributes {
  attributes: Set<ArgumentAttribute>;
  arraySize: ArraySize;
}

/**
 * Space-separated attribute words of an `arg` declaration:
 * `const`, `com_out`, `ca<N>` (count in argument N), `cc<N>` (constant count N).
 * At most one array-size word is allowed.
 */
export function parseArgumentAttributes(text: string, context: ErrorContext): ParsedArgumentAttributes {
  const attributes = new Set<ArgumentAttribute>();
  let arraySize: ArraySize = { kind: 'none' };

  const setArraySize = (next: ArraySize, word: string): void => {
    if (arraySize.kind !== 'none') {
      throw new SemanticError(
        `"${word}" conflicts with an earlier array size attribute; ca<N> and cc<N> are mutually exclusive`,
        'ERR_ARRAY_SIZE_CONFLICT',
        context
      );
    }
    arraySize = next;
  };

  for (const word of text.split(' ').filter((w) => w !== '')) {
    if (word === 'const') {
      attributes.add('const');
      continue;
    }
    if (word === 'com_out') {
      attributes.add('comOut');
      continue;
    }

    const countParam = COUNT_PARAM_PATTERN.exec(word);
    if (countParam) {
      const index = parseUnsigned(countParam[1], 'count argument index', 'ERR_INVALID_NUMBER', context);
      if (index > MAX_COUNT_PARAM_INDEX) {
        throw new SemanticError(`count argument index ${index} is too large`, 'ERR_VALUE_OUT_OF_RANGE', context);
      }
      setArraySize({ kind: 'countParam', index }, word);
      continue;
    }

    const countConst = COUNT_CONST_PATTERN.exec(word);
    if (countConst) {
      const count = parseUnsigned(countConst[1], 'constant count', 'ERR_INVALID_NUMBER', context);
      if (count > MAX_COUNT_CONST) {
        throw new SemanticError(`constant count ${count} is too large`, 'ERR_VALUE_OUT_OF_RANGE', context);
      }
      setArraySize({ kind: 'countConst', count }, word);
      continue;
    }

    throw new GrammarError(
      `unknown argument attribute "${word}"`,
      'ERR_UNKNOWN_ATTRIBUTE',
      context,
      'Known attributes: const, com_out, ca<N>, cc<N>'
    );
  }

  return { attributes, arraySize };
}
