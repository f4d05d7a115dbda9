import readline from 'readline';
import { Writable } from 'stream';

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Ask for a password without echoing it.
 * The prompt goes to stderr so stdout stays clean for the inventory.
 * Resolves with an empty string if input ends before a line is entered.
 */
export async function promptPassword(prompt = 'Password: ', streams: PromptStreams = {}): Promise<string> {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stderr;

  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  const terminal = 'isTTY' in input && input.isTTY === true;
  const rl = readline.createInterface({ input, output: muted, terminal });

  output.write(prompt);
  try {
    return await new Promise<string>((resolve) => {
      let answered = false;
      rl.once('line', (line) => {
        answered = true;
        resolve(line);
      });
      rl.once('close', () => {
        if (!answered) resolve('');
      });
    });
  } finally {
    rl.close();
    output.write('\n');
  }
}
