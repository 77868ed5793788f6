import { vi } from 'vitest';

export function stripAnsi(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i += 1) {
    if (value[i] === '\u001B' && value[i + 1] === '[') {
      i += 2;
      while (i < value.length) {
        const ch = value[i] ?? '';
        if ((ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z')) {
          break;
        }
        i += 1;
      }
      continue;
    }
    out += value[i] ?? '';
  }
  return out;
}

export interface ConsoleCapture {
  /**
   * Lines printed with console.log, colours stripped. Text written to
   * process.stdout without a newline is joined to the line that follows it.
   */
  stdout: string[];
  /** console.error calls, one entry per call, colours stripped */
  stderr: string[];
}

/**
 * Capture console.log, console.error and process.stdout.write.
 * Undone by vi.restoreAllMocks().
 */
export function captureConsole(): ConsoleCapture {
  const capture: ConsoleCapture = { stdout: [], stderr: [] };
  let partial = '';
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    const text = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8');
    const lines = (partial + stripAnsi(text)).split('\n');
    partial = lines.pop() ?? '';
    capture.stdout.push(...lines);
    return true;
  });
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    capture.stdout.push(partial + stripAnsi(args.map(String).join(' ')));
    partial = '';
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    capture.stderr.push(stripAnsi(args.map(String).join(' ')));
  });
  return capture;
}

export class ExitCalled extends Error {
  readonly code: number | string | null | undefined;

  constructor(code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
    this.name = 'ExitCalled';
    this.code = code;
  }
}

/**
 * Make process.exit throw ExitCalled instead of ending the run.
 */
export function stubExit(): void {
  vi.spyOn(process, 'exit').mockImplementation((code?: number | string | null) => {
    throw new ExitCalled(code);
  });
}
