/**
 * Code list input for batch checks.
 * One entry per line; blank lines and lines starting with # are ignored.
 */
import * as fs from 'node:fs';
import { extractGiftCode } from '../extract.js';
import { InputFileError } from '../errors.js';
import { readStdin } from '../utils.js';

export interface MalformedLine {
  /** 1-based line number */
  line: number;
  text: string;
}

export interface CodeList {
  codes: string[];
  malformed: MalformedLine[];
}

/** Source name that reads the list from stdin */
export const STDIN_SOURCE = '-';

export function parseCodeList(content: string): CodeList {
  const codes: string[] = [];
  const malformed: MalformedLine[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }
    const code = extractGiftCode(line);
    if (code != null) {
      codes.push(code);
    } else {
      malformed.push({ line: index + 1, text: line });
    }
  });

  return { codes, malformed };
}

/**
 * Read a code file. Throws InputFileError when it is missing or unreadable.
 */
export function readCodeFile(filename: string): string {
  if (!fs.existsSync(filename)) {
    throw new InputFileError(filename, `File '${filename}' not found!`);
  }
  try {
    return fs.readFileSync(filename, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputFileError(filename, `Could not read '${filename}': ${reason}`);
  }
}

/**
 * Load and parse a code list from a file, or from stdin when source is "-".
 */
export async function loadCodeList(source: string): Promise<CodeList> {
  const content = source === STDIN_SOURCE ? await readStdin() : readCodeFile(source);
  return parseCodeList(content);
}
