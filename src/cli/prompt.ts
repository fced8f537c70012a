import { createInterface } from 'node:readline';

export type PromptInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface PromptStreams {
  input: PromptInput;
  output: NodeJS.WritableStream;
}

const CTRL_C = '\u0003';
const CTRL_D = '\u0004';
const BACKSPACE = '\u007f';

export class PromptCancelledError extends Error {
  constructor(message = 'input cancelled') {
    super(message);
    this.name = 'PromptCancelledError';
  }
}

/**
 * Ask a question and read one line of input.
 * @throws PromptCancelledError when the input ends before a line is read
 */
export function promptLine(question: string, streams: PromptStreams): Promise<string> {
  const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });
  return new Promise((resolve, reject) => {
    let answered = false;
    rl.once('close', () => {
      if (!answered) {
        reject(new PromptCancelledError('input closed'));
      }
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Read a password without echoing it. Falls back to a plain line read when
 * the input is not a terminal (piped input).
 * @throws PromptCancelledError on Ctrl+C
 */
export function promptHidden(question: string, streams: PromptStreams): Promise<string> {
  const { input, output } = streams;
  if (!input.isTTY || typeof input.setRawMode !== 'function') {
    return promptLine(question, streams);
  }
  const setRawMode = input.setRawMode.bind(input);

  return new Promise((resolve, reject) => {
    let value = '';

    const cleanup = () => {
      input.off('data', onData);
      setRawMode(false);
      input.pause();
      output.write('\n');
    };

    const onData = (chunk: string | Buffer) => {
      for (const ch of String(chunk)) {
        if (ch === '\r' || ch === '\n' || ch === CTRL_D) {
          cleanup();
          resolve(value);
          return;
        }
        if (ch === CTRL_C) {
          cleanup();
          reject(new PromptCancelledError());
          return;
        }
        if (ch === BACKSPACE || ch === '\b') {
          value = value.slice(0, -1);
        } else if (ch >= ' ') {
          value += ch;
        }
      }
    };

    output.write(question);
    setRawMode(true);
    input.setEncoding('utf8');
    input.on('data', onData);
    input.resume();
  });
}
