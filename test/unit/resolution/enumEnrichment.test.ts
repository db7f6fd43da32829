/**
 * Enum enrichment
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { Enumeration, TypeReference } from '@apimeta/types';
import { enrichTypeReference, type EnrichmentScope, type TypeResolutionOptions } from '@apimeta/core';

const options: TypeResolutionOptions = { win32Assembly: 'Windows.Win32.winmd' };

function scopeWith(...enums: Enumeration[]): EnrichmentScope {
  return {
    header: { name: 'Foo', version: '1.0' },
    functionPointers: [],
    enums: new Map(enums.map((e) => [e.name, e])),
  };
}

const MODE: Enumeration = {
  name: 'Mode',
  baseType: { name: 'UINT16', depth: 0 },
  isFlags: false,
  variants: new Map(),
};

describe('enrichTypeReference', () => {
  it('should rewrite a reference to the base type and remember the enumeration', () => {
    const ref: TypeReference = { name: 'Mode', depth: 0 };
    const linked = enrichTypeReference(ref, scopeWith(MODE), options);

    assert.strictEqual(linked, MODE);
    assert.deepStrictEqual(ref, { name: 'UINT16', depth: 0, baseEnum: 'Mode' });
  });

  it('should ignore pointer references', () => {
    const ref: TypeReference = { name: 'Mode', depth: 1 };
    assert.strictEqual(enrichTypeReference(ref, scopeWith(MODE), options), undefined);
    assert.deepStrictEqual(ref, { name: 'Mode', depth: 1 });
  });

  it('should ignore names that are not enumerations', () => {
    const ref: TypeReference = { name: 'UINT32', depth: 0 };
    assert.strictEqual(enrichTypeReference(ref, scopeWith(MODE), options), undefined);
    assert.deepStrictEqual(ref, { name: 'UINT32', depth: 0 });
  });

  it('should match on the resolved IL type', () => {
    // COM-shaped names resolve to "class Foo.IMode", which no enumeration is called
    const imode: Enumeration = { ...MODE, name: 'IMode' };
    const ref: TypeReference = { name: 'IMode', depth: 0 };
    assert.strictEqual(enrichTypeReference(ref, scopeWith(imode), options), undefined);
  });
});
