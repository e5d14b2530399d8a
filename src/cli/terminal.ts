import * as readline from 'readline/promises';

export interface Terminal {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

/** End of input (Ctrl-D or a closed pipe). Unwinds every menu back to main. */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(question) {
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<string>((resolve, reject) => {
        const onClose = (): void => reject(new InputClosedError());
        rl.once('close', onClose);
        rl.question(question).then(
          answer => {
            rl.off('close', onClose);
            resolve(answer);
          },
          (err: unknown) => {
            rl.off('close', onClose);
            reject(err);
          },
        );
      });
    },
    print(line = '') {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
