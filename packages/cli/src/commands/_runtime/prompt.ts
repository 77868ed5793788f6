import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export interface Prompter {
  /** Resolves null once input has ended */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout
): Prompter {
  const terminal = 'isTTY' in input && input.isTTY === true;
  const rl = createInterface({ input, output, terminal });

  // piped input can deliver lines while no question is pending
  const queued: string[] = [];
  rl.on('line', (line) => {
    queued.push(line);
  });

  let closed = false;
  const ended = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    async ask(question) {
      const next = queued.shift();
      if (next !== undefined) {
        output.write(question);
        return next;
      }
      if (closed) return null;
      return Promise.race([rl.question(question), ended]);
    },
    close() {
      rl.close();
    },
  };
}
