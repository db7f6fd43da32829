/**
 * Type References - a named type plus pointer indirection
 */

/**
 * A reference to a type by name, as written in a declaration.
 *
 * `depth` is the number of pointer indirections (`UINT32` with depth 2 is
 * `uint32**`). `baseEnum` is never written by a declaration: enrichment sets it
 * when the name resolved to a previously declared enumeration.
 */
export interface TypeReference {
  name: string;
  depth: number;
  baseEnum?: string;
}

/**
 * Result type of `stdmeth` declarations
 */
export const RESULT_CODE_TYPE = 'HRESULT';
