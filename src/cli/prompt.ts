import * as readline from 'readline';

export interface SecretInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export class PromptAbortedError extends Error {
  constructor(message = 'Input aborted') {
    super(message);
    this.name = 'PromptAbortedError';
  }
}

const CTRL_C = '\u0003';
const CTRL_D = '\u0004';
const BACKSPACE = new Set(['\u0008', '\u007f']);

/**
 * Read one line without echoing it. On a terminal the input is switched to raw
 * mode for the duration of the read; otherwise the first piped line is used.
 */
export function readSecret(
  prompt: string,
  input: SecretInput = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Promise<string> {
  output.write(prompt);
  return input.isTTY && input.setRawMode
    ? readRaw(input, output)
    : readPiped(input);
}

function readRaw(input: SecretInput, output: NodeJS.WritableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    let value = '';

    const finish = (err?: Error) => {
      input.removeListener('data', onData);
      input.setRawMode?.(false);
      input.pause();
      output.write('\n');
      if (err) reject(err);
      else resolve(value);
    };

    const onData = (chunk: Buffer | string) => {
      for (const ch of String(chunk)) {
        if (ch === '\r' || ch === '\n') return finish();
        if (ch === CTRL_C || ch === CTRL_D) return finish(new PromptAbortedError());
        if (BACKSPACE.has(ch)) value = value.slice(0, -1);
        else value += ch;
      }
    };

    input.setRawMode?.(true);
    input.setEncoding('utf8');
    input.on('data', onData);
    input.resume();
  });
}

function readPiped(input: SecretInput): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({ input, terminal: false });
    let answered = false;

    rl.once('line', (line) => {
      answered = true;
      rl.close();
      resolve(line);
    });
    rl.once('close', () => {
      if (!answered) reject(new PromptAbortedError('No input received'));
    });
  });
}
