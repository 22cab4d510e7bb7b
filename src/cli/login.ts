// src/cli/login.ts

import readline from 'readline';
import { ExportError } from '../utils/errors';

export interface Login {
  username: string;
  password: string;
}

/**
 * Terminal-like input. `process.stdin` satisfies it; so does a stream with
 * the TTY fields attached.
 */
export interface PromptInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface PromptIO {
  input: PromptInput;
  output: NodeJS.WritableStream;
}

type RawModeInput = PromptInput & { setRawMode(mode: boolean): unknown };

function canHideInput(input: PromptInput): input is RawModeInput {
  return input.isTTY === true && typeof input.setRawMode === 'function';
}

function cancelled(): ExportError {
  return new ExportError('Login prompt cancelled', 'PROMPT_CANCELLED');
}

/**
 * Read one line with terminal echo off. Keys are consumed in raw mode and
 * nothing of the typed value is written to `output`.
 */
export function readHidden(io: PromptIO & { input: RawModeInput }, question: string): Promise<string> {
  const { input, output } = io;

  return new Promise((resolve, reject) => {
    output.write(question);

    const wasRaw = input.isRaw ?? false;
    let value = '';

    const finish = () => {
      input.setRawMode(wasRaw);
      input.removeListener('data', onData);
      input.pause();
      output.write('\n');
    };

    const onData = (chunk: string | Buffer) => {
      for (const char of chunk.toString()) {
        // Ctrl+C, Ctrl+D
        if (char === '\u0003' || char === '\u0004') {
          finish();
          reject(cancelled());
          return;
        }

        if (char === '\r' || char === '\n') {
          finish();
          resolve(value);
          return;
        }

        // Backspace
        if (char === '\u007f' || char === '\b') {
          value = value.slice(0, -1);
          continue;
        }

        value += char;
      }
    };

    input.setRawMode(true);
    input.setEncoding('utf8');
    input.on('data', onData);
    input.resume();
  });
}

/**
 * Ask each question in turn and collect one line per answer. Lines that
 * arrive early (piped input) are buffered, not dropped.
 */
async function askLines(io: PromptIO, questions: readonly string[]): Promise<string[]> {
  // terminal: false, or readline would echo every key itself
  const rl = readline.createInterface({ input: io.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const answers: string[] = [];

  try {
    for (const question of questions) {
      io.output.write(question);
      const line = await lines.next();
      if (line.done) {
        throw cancelled();
      }
      answers.push(line.value);
    }
  } finally {
    rl.close();
  }

  return answers;
}

/**
 * Ask for username and password. On a terminal the password is read with
 * echo off; piped input supplies both as consecutive lines.
 *
 * @throws {ExportError} PROMPT_CANCELLED if input ends or Ctrl+C is pressed
 */
export async function readLogin(io: PromptIO): Promise<Login> {
  const { input, output } = io;

  if (!canHideInput(input)) {
    const [username, password] = await askLines(io, ['username? ', 'password? ']);
    return { username: username.trim(), password };
  }

  const [username] = await askLines(io, ['username? ']);
  const password = await readHidden({ input, output }, 'password? ');
  return { username: username.trim(), password };
}
