/**
 * Command table of the definition language
 */

export const COMMAND_KEYWORDS = [
  'meta',
  'fptr',
  'dll',
  'fn',
  'arg',
  'optarg',
  'iface',
  'meth',
  'stdmeth',
  'include',
  'enum',
  'flags',
  'variant',
  'struct',
  'field',
  'guid',
] as const;

export type CommandKeyword = typeof COMMAND_KEYWORDS[number];

export interface CommandSyntax {
  usage: string;
  /** Field counts accepted after the keyword */
  minFields: number;
  maxFields: number;
}

export const COMMAND_SYNTAX: Record<CommandKeyword, CommandSyntax> = {
  meta: { usage: 'meta NAME VERSION', minFields: 2, maxFields: 2 },
  fptr: { usage: 'fptr NAME RETTYPE RETDEPTH [CALLCONV]', minFields: 3, maxFields: 4 },
  dll: { usage: 'dll NAME', minFields: 1, maxFields: 1 },
  fn: { usage: 'fn NAME RETTYPE RETDEPTH [CALLCONV]', minFields: 3, maxFields: 4 },
  arg: { usage: 'arg DIRECTION NAME TYPE DEPTH [ATTRIBS]', minFields: 4, maxFields: 5 },
  optarg: { usage: 'optarg DIRECTION NAME TYPE DEPTH [ATTRIBS]', minFields: 4, maxFields: 5 },
  iface: { usage: 'iface NAME GROUP VALUE BASETYPE', minFields: 4, maxFields: 4 },
  meth: { usage: 'meth NAME RETTYPE RETDEPTH', minFields: 3, maxFields: 3 },
  stdmeth: { usage: 'stdmeth NAME', minFields: 1, maxFields: 1 },
  include: { usage: 'include PATH', minFields: 1, maxFields: 1 },
  enum: { usage: 'enum NAME BASETYPE', minFields: 2, maxFields: 2 },
  flags: { usage: 'flags NAME BASETYPE', minFields: 2, maxFields: 2 },
  variant: { usage: 'variant NAME VALUE', minFields: 2, maxFields: 2 },
  struct: { usage: 'struct NAME', minFields: 1, maxFields: 1 },
  field: { usage: 'field NAME TYPE DEPTH', minFields: 3, maxFields: 3 },
  guid: { usage: 'guid NAME GUID', minFields: 2, maxFields: 2 },
};

export function isCommandKeyword(value: string): value is CommandKeyword {
  return COMMAND_KEYWORDS.some((keyword) => keyword === value);
}
