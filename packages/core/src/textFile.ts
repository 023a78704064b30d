/**
 * Line and byte utilities for the engineering text files
 */

import fs from 'fs/promises';
import { MissingInputError, isNotFound } from './errors.js';

export type LineEnding = 'LF' | 'CRLF';

/**
 * Detect the line ending style used in content.
 * Returns 'CRLF' if Windows-style line endings dominate, 'LF' otherwise.
 */
export function detectLineEnding(content: string): LineEnding {
  const crlfCount = (content.match(/\r\n/g) || []).length;
  const lfCount = (content.match(/(?<!\r)\n/g) || []).length;
  return crlfCount > lfCount ? 'CRLF' : 'LF';
}

export function lineEndingChars(style: LineEnding): string {
  return style === 'CRLF' ? '\r\n' : '\n';
}

export interface SplitLine {
  text: string;
  /** '\n', '\r\n', or '' for a last line without terminator */
  eol: string;
}

/**
 * Split content into lines, keeping each line's terminator.
 * Joining text + eol of every entry gives back the input.
 */
export function splitLines(content: string): SplitLine[] {
  const lines: SplitLine[] = [];
  let start = 0;
  while (start < content.length) {
    const nl = content.indexOf('\n', start);
    if (nl === -1) {
      lines.push({ text: content.slice(start), eol: '' });
      break;
    }
    const crlf = nl > start && content[nl - 1] === '\r';
    lines.push({
      text: content.slice(start, crlf ? nl - 1 : nl),
      eol: crlf ? '\r\n' : '\n',
    });
    start = nl + 1;
  }
  return lines;
}

export function joinLines(lines: SplitLine[]): string {
  return lines.map(l => l.text + l.eol).join('');
}

/**
 * Read a text file, mapping ENOENT to MissingInputError.
 * With 'latin1' every byte maps to one character and writes back unchanged.
 */
export async function readInputFile(
  filePath: string,
  what: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<string> {
  try {
    return await fs.readFile(filePath, encoding);
  } catch (error) {
    if (isNotFound(error)) {
      throw new MissingInputError(what, filePath);
    }
    throw error;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface FieldReplacement {
  content: Buffer;
  replaced: boolean;
  previous?: string;
}

/**
 * Replace the value after `<field><spaces>` on the first line that starts
 * with the field name. The value runs to the end of its line.
 *
 * Works on raw bytes: the buffer is matched through a latin1 view, whose
 * offsets are byte offsets, so everything outside the value is kept as-is
 * whatever its encoding. The new value is written as UTF-8.
 */
export function replaceFieldValue(content: Buffer, field: string, value: string): FieldReplacement {
  const view = content.toString('latin1');
  const pattern = new RegExp(`^([ \\t]*${escapeRegex(field)}[ \\t]+)([^\\r\\n]*)`, 'm');
  const match = pattern.exec(view);
  if (!match) {
    return { content, replaced: false };
  }

  const valueStart = match.index + match[1].length;
  const valueEnd = valueStart + match[2].length;
  return {
    content: Buffer.concat([
      content.subarray(0, valueStart),
      Buffer.from(value, 'utf-8'),
      content.subarray(valueEnd),
    ]),
    replaced: true,
    previous: content.subarray(valueStart, valueEnd).toString('utf-8'),
  };
}
