/**
 * IlRenderer Tests
 *
 * Renders models collected from small definition files and checks the
 * emitted IL blocks byte for byte.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { MetadataModel } from '@apimeta/types';
import {
  DeclarationCollector,
  MemorySourceReader,
  renderIl,
  type RenderOptions,
} from '@apimeta/core';

// =============================================================================
// Test Helpers
// =============================================================================

function source(...rows: string[][]): string {
  return rows.map((fields) => fields.join('\t')).join('\n') + '\n';
}

function collect(text: string): MetadataModel {
  const collector = new DeclarationCollector({ reader: new MemorySourceReader({ 'api.txt': text }) });
  collector.collectFile('api.txt');
  return collector.finish();
}

function render(text: string, options: Partial<RenderOptions> = {}): string {
  return renderIl(collect(text), options);
}

function block(...lines: string[]): string {
  return lines.join('\n');
}

const META = ['meta', 'Foo', '1.0'];
const W32 = '[Windows.Win32.winmd]Windows.Win32.Foundation.Metadata';
const HRESULT = 'valuetype [Windows.Win32.winmd]Windows.Win32.Foundation.HRESULT';

// =============================================================================
// TESTS: Preamble
// =============================================================================

describe('renderIl', () => {
  describe('preamble', () => {
    it('should declare each dll once, lower-cased and sorted', () => {
      const il = render(source(
        META,
        ['dll', 'Zeta.dll'],
        ['fn', 'A', 'void', '0'],
        ['dll', 'ALPHA.DLL'],
        ['fn', 'B', 'void', '0'],
        ['dll', 'zeta.DLL'],
        ['fn', 'C', 'void', '0'],
      ));

      assert.ok(il.startsWith(block(
        ".module extern 'alpha.dll'",
        ".module extern 'zeta.dll'",
        '',
        '.assembly extern netstandard',
      )));
    });

    it('should name the assembly and module after the header', () => {
      const il = render(source(['meta', 'SevenZip', '1:0:0:0']));

      assert.ok(il.startsWith('.assembly extern netstandard\n'));
      assert.ok(il.includes(block(
        '.assembly extern Windows.Win32.winmd',
        '{',
        '    .ver 0:0:0:0',
        '}',
        '',
        '.assembly SevenZip.winmd',
        '{',
        '    .ver 1:0:0:0',
        '}',
        '',
        '.module SevenZip.winmd',
        '.imagebase 0x00400000',
      )));
      assert.ok(il.endsWith('.corflags 0x00000001 // ILOnly\n'));
    });

    it('should reference the configured Win32 assembly', () => {
      const il = render(source(META, ['dll', 'foo.dll'], ['fn', 'DoThing', 'HRESULT', '0']), { win32Assembly: 'Win32Meta' });

      assert.ok(il.includes('.assembly extern Win32Meta\n'));
      assert.ok(il.includes('valuetype [Win32Meta]Windows.Win32.Foundation.HRESULT DoThing () cil managed'));
    });
  });

  // ===========================================================================
  // TESTS: Entry points
  // ===========================================================================

  describe('Apis class', () => {
    it('should render a pinvoke method with a plain argument', () => {
      const il = render(source(
        META,
        ['dll', 'foo.dll'],
        ['fn', 'DoThing', 'HRESULT', '0'],
        ['arg', 'in', 'count', 'UINT32', '0'],
      ));

      assert.strictEqual(il.match(/\.module extern/g)?.length, 1);
      assert.ok(il.includes(block(
        '.class public auto autochar abstract sealed beforefieldinit Foo.Apis',
        '    extends [netstandard]System.Object',
        '{',
        '    .method public hidebysig pinvokeimpl("foo.dll" nomangle winapi)',
        `        ${HRESULT} DoThing (`,
        "            [in] uint32 'count'",
        '        ) cil managed',
        '    {',
        '    }',
        '}',
      )));
      assert.ok(!il.includes('.param'));
    });

    it('should keep the declared dll spelling and calling convention', () => {
      const il = render(source(META, ['dll', 'Foo.DLL'], ['fn', 'Later', 'void', '0', 'cdecl']));
      assert.ok(il.includes('.method public hidebysig pinvokeimpl("Foo.DLL" nomangle cdecl)'));
    });

    it('should render direction and optional flags', () => {
      const il = render(source(
        META,
        ['dll', 'foo.dll'],
        ['fn', 'Copy', 'HRESULT', '0'],
        ['arg', 'in', 'source', 'void', '1'],
        ['arg', 'inout', 'size', 'size_t', '1'],
        ['optarg', 'out', 'written', 'UINT64', '1'],
      ));

      assert.ok(il.includes(block(
        "            [in] void* 'source',",
        "            [in] [out] native uint* 'size',",
        "            [out] [opt] uint64* 'written'",
      )));
    });

    it('should attach attribute blobs to the right parameters', () => {
      const il = render(source(
        META,
        ['enum', 'Mode', 'UINT32'],
        ['dll', 'foo.dll'],
        ['fn', 'Read', 'HRESULT', '0'],
        ['arg', 'out', 'data', 'BYTE', '1', 'const ca1'],
        ['arg', 'in', 'size', 'UINT32', '0'],
        ['optarg', 'out', 'mode', 'Mode', '0'],
        ['arg', 'out', 'stream', 'IInStream', '2', 'com_out'],
        ['arg', 'in', 'key', 'BYTE', '1', 'cc16'],
      ));

      assert.ok(il.includes(block(
        "            [out] uint8* 'data',",
        "            [in] uint32 'size',",
        "            [out] [opt] uint32 'mode',",
        "            [out] class Foo.IInStream** 'stream',",
        "            [in] uint8* 'key'",
        '        ) cil managed',
        '    {',
        '        .param [1]',
        `            .custom instance void ${W32}.ConstAttribute::.ctor() = ( 01 00 00 00 )`,
        `            .custom instance void ${W32}.NativeArrayInfoAttribute::.ctor() = ( 01 00 01 00 53 06 0F 43 6F 75 6E 74 50 61 72 61 6D 49 6E 64 65 78 01 00 ) // CountParamIndex = 1`,
        '        .param [3]',
        `            .custom instance void ${W32}.AssociatedEnumAttribute::.ctor(string) = ( 01 00 04 4D 6F 64 65 00 00 ) // Mode`,
        '        .param [4]',
        `            .custom instance void ${W32}.ComOutPtrAttribute::.ctor() = ( 01 00 00 00 )`,
        '        .param [5]',
        `            .custom instance void ${W32}.NativeArrayInfoAttribute::.ctor() = ( 01 00 01 00 53 08 0A 43 6F 75 6E 74 43 6F 6E 73 74 10 00 00 00 ) // CountConst = 16`,
        '    }',
      )));
      assert.ok(!il.includes('.param [2]'));
    });

    it('should render GUID constants as fields with GuidAttribute', () => {
      const il = render(source(META, ['guid', 'CLSID_Format', '23170F69-40C1-278A-1000-000110070000']));

      assert.ok(il.includes(block(
        '{',
        "    .field public static valuetype [netstandard]System.Guid 'CLSID_Format'",
        `    .custom instance void ${W32}.GuidAttribute::.ctor(uint32, uint16, uint16, uint8, uint8, uint8, uint8, uint8, uint8, uint8, uint8) = ( 01 00 69 0F 17 23 C1 40 8A 27 10 00 00 01 10 07 00 00 00 00 ) // 23170F69-40C1-278A-1000-000110070000`,
        '}',
      )));
    });

    it('should omit the class when there are no functions or GUID constants', () => {
      const il = render(source(META, ['struct', 'Empty']));
      assert.ok(!il.includes('Foo.Apis'));
    });
  });

  // ===========================================================================
  // TESTS: Function pointers
  // ===========================================================================

  describe('function pointers', () => {
    it('should render a delegate with the calling convention blob', () => {
      const il = render(source(
        META,
        ['fptr', 'Callback', 'INT32', '0', 'cdecl'],
        ['arg', 'in', 'value', 'UINT32', '0'],
      ));

      assert.ok(il.includes(block(
        '.class public auto autochar sealed beforefieldinit Foo.Callback',
        '    extends [netstandard]System.MulticastDelegate',
        '{',
        '    .custom instance void [netstandard]System.Runtime.InteropServices.UnmanagedFunctionPointerAttribute::.ctor(valuetype [netstandard]System.Runtime.InteropServices.CallingConvention) = ( 01 00 02 00 00 00 00 00 )',
        '',
        '    .method public hidebysig specialname rtspecialname',
        "        instance void .ctor (object 'object', native int 'method') runtime managed",
        '    {',
        '    }',
        '',
        '    .method public hidebysig newslot virtual',
        '        instance int32 Invoke (',
        "            [in] uint32 'value'",
        '        ) runtime managed',
        '    {',
        '    }',
        '}',
      )));
    });

    it('should reference declared function pointers as classes', () => {
      const il = render(source(
        META,
        ['fptr', 'Callback', 'void', '0'],
        ['dll', 'foo.dll'],
        ['fn', 'Register', 'void', '0'],
        ['arg', 'in', 'callback', 'Callback', '0'],
      ));
      assert.ok(il.includes("            [in] class Foo.Callback 'callback'"));
    });
  });

  // ===========================================================================
  // TESTS: Interfaces
  // ===========================================================================

  describe('interfaces', () => {
    it('should substitute group and value into the identifier', () => {
      const il = render(
        source(META, ['iface', 'IInStream', '5', '9', 'IUnknown']),
        { interfaceGuidTemplate: '00000000-0000-0000-0000-000000000000' }
      );

      const match = /GuidAttribute::\.ctor\([^)]*\) = \( ([0-9A-F ]+) \)/.exec(il);
      assert.ok(match);
      assert.strictEqual(match[1], '01 00 00 00 00 00 00 00 00 00 00 00 00 05 00 09 00 00 00 00');
    });

    it('should render the interface with its methods', () => {
      const il = render(source(
        META,
        ['iface', 'IInStream', '5', '9', 'IUnknown'],
        ['meth', 'Read', 'HRESULT', '0'],
        ['arg', 'out', 'data', 'void', '1', 'ca1'],
        ['arg', 'in', 'size', 'UINT32', '0'],
        ['stdmeth', 'Close'],
      ));

      assert.ok(il.includes(block(
        '.class interface public abstract auto ansi Foo.IInStream',
        '    implements class [Windows.Win32.winmd]Windows.Win32.System.Com.IUnknown',
        '{',
        `    .custom instance void ${W32}.GuidAttribute::.ctor(uint32, uint16, uint16, uint8, uint8, uint8, uint8, uint8, uint8, uint8, uint8) = ( 01 00 69 0F 17 23 C1 40 8A 27 00 00 00 05 00 09 00 00 00 00 ) // 23170F69-40C1-278A-0000-000500090000`,
        '',
        '    .method public hidebysig newslot abstract virtual',
        `        instance ${HRESULT} Read (`,
        "            [out] void* 'data',",
        "            [in] uint32 'size'",
        '        ) cil managed',
        '    {',
        '        .param [1]',
        `            .custom instance void ${W32}.NativeArrayInfoAttribute::.ctor() = ( 01 00 01 00 53 06 0F 43 6F 75 6E 74 50 61 72 61 6D 49 6E 64 65 78 01 00 ) // CountParamIndex = 1`,
        '    }',
        '',
        '    .method public hidebysig newslot abstract virtual',
        `        instance ${HRESULT} Close () cil managed`,
        '    {',
        '    }',
        '}',
      )));
    });

    it('should implement a locally declared base interface', () => {
      const il = render(source(
        META,
        ['iface', 'IInStream', '3', '3', 'IUnknown'],
        ['iface', 'IInStreamEx', '3', '4', 'IInStream'],
      ));
      assert.ok(il.includes('.class interface public abstract auto ansi Foo.IInStreamEx\n    implements class Foo.IInStream\n'));
    });
  });

  // ===========================================================================
  // TESTS: Enumerations and structs
  // ===========================================================================

  describe('enumerations', () => {
    it('should render literal fields in declaration order', () => {
      const il = render(source(
        META,
        ['enum', 'Mode', 'UINT32'],
        ['variant', 'Read', '1'],
        ['variant', 'Write', '0x2'],
      ));

      assert.ok(il.includes(block(
        '.class public auto ansi sealed Foo.Mode',
        '    extends [netstandard]System.Enum',
        '{',
        '    .field public specialname rtspecialname uint32 value__',
        '    .field public static literal valuetype Foo.Mode Read = uint32(1)',
        '    .field public static literal valuetype Foo.Mode Write = uint32(2)',
        '}',
      )));
      assert.ok(!il.includes('FlagsAttribute'));
    });

    it('should mark flags enumerations', () => {
      const il = render(source(
        META,
        ['flags', 'Access', 'INT8'],
        ['variant', 'Min', '-128'],
      ));

      assert.ok(il.includes(block(
        '{',
        '    .custom instance void [netstandard]System.FlagsAttribute::.ctor() = ( 01 00 00 00 )',
        '    .field public specialname rtspecialname int8 value__',
        '    .field public static literal valuetype Foo.Access Min = int8(-128)',
        '}',
      )));
    });

    it('should reject a value that does not fit the base type', () => {
      assert.throws(() => render(source(META, ['enum', 'Small', 'UINT8'], ['variant', 'Big', '256'])), {
        name: 'RenderError',
        code: 'ERR_VARIANT_RANGE',
        message: 'enumeration Small: variant Big = 256 does not fit in uint8',
      });
      assert.throws(() => render(source(META, ['enum', 'Unsigned', 'DWORD'], ['variant', 'Negative', '-1'])), {
        name: 'RenderError',
        code: 'ERR_VARIANT_RANGE',
      });
    });

    it('should reject a base type that is not an integer', () => {
      assert.throws(() => render(source(META, ['enum', 'Odd', 'HRESULT'])), {
        name: 'RenderError',
        code: 'ERR_ENUM_BASE_TYPE',
      });
    });
  });

  describe('structs', () => {
    it('should render a sequential value type', () => {
      const il = render(source(
        META,
        ['struct', 'Range'],
        ['field', 'offset', 'UINT64', '0'],
        ['field', 'name', 'WCHAR', '1'],
      ));

      assert.ok(il.endsWith(block(
        '.class public sequential ansi sealed beforefieldinit Foo.Range',
        '    extends [netstandard]System.ValueType',
        '{',
        "    .field public uint64 'offset'",
        "    .field public char* 'name'",
        '}',
      ) + '\n'));
    });
  });

  // ===========================================================================
  // TESTS: Layout
  // ===========================================================================

  describe('layout', () => {
    it('should emit sections in a fixed order', () => {
      const il = render(source(
        META,
        ['struct', 'Range'],
        ['enum', 'Mode', 'UINT32'],
        ['iface', 'IInStream', '3', '3', 'IUnknown'],
        ['dll', 'foo.dll'],
        ['fn', 'DoThing', 'HRESULT', '0'],
        ['fptr', 'Callback', 'void', '0'],
      ));

      const positions = ['.module Foo.winmd', 'Foo.Callback', 'Foo.Apis', 'Foo.IInStream', 'Foo.Mode', 'Foo.Range']
        .map((marker) => il.indexOf(marker));
      assert.ok(positions.every((position) => position >= 0), `all sections present: ${positions.join(', ')}`);
      assert.deepStrictEqual([...positions].sort((a, b) => a - b), positions);
    });

    it('should render the same model identically twice', () => {
      const model = collect(source(META, ['enum', 'Mode', 'UINT32'], ['dll', 'foo.dll'], ['fn', 'F', 'Mode', '0']));
      assert.strictEqual(renderIl(model), renderIl(model));
    });
  });
});
