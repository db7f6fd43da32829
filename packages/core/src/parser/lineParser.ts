/**
 * Line parser for the definition language
 *
 * One declaration per line, fields separated by tabs, `#` starts a comment
 * running to the end of the line. There is no quoting: a field cannot
 * contain a tab or a `#`.
 */

export interface ParsedLine {
  /** First field: the command keyword */
  command: string;
  /** Remaining fields, in order */
  fields: string[];
}

/**
 * Split one raw line into a command and its fields.
 *
 * @returns null for blank and comment-only lines
 */
export function parseLine(raw: string): ParsedLine | null {
  let line = raw.replace(/[\r\n]+$/, '');

  const hashIndex = line.indexOf('#');
  if (hashIndex !== -1) {
    line = line.slice(0, hashIndex);
  }
  line = line.trimEnd();

  if (line.trim() === '') {
    return null;
  }

  const [command, ...fields] = line.split('\t');
  return { command, fields };
}

/**
 * Split file content into lines; the line terminator stays for parseLine to strip.
 */
export function splitLines(content: string): string[] {
  return content.split(/(?<=\n)/);
}
