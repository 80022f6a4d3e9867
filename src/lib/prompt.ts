import readline from 'node:readline';

/** Ctrl-C while waiting for input. */
export class PromptInterruptedError extends Error {
  constructor() {
    super('Interrupted by user');
    this.name = 'PromptInterruptedError';
  }
}

/** Input ended (EOF) while waiting for an answer. */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

export interface MenuPrompt {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createMenuPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): MenuPrompt {
  const rl = readline.createInterface({ input, output });
  let pending: { resolve: (answer: string) => void; reject: (err: Error) => void } | null = null;
  let closed = false;
  let interrupted = false;

  const settle = (err: Error) => {
    const current = pending;
    pending = null;
    current?.reject(err);
  };

  rl.on('SIGINT', () => {
    if (pending) {
      settle(new PromptInterruptedError());
    } else {
      interrupted = true;
    }
  });
  rl.on('close', () => {
    closed = true;
    settle(new PromptClosedError());
  });

  return {
    ask(question) {
      if (interrupted) {
        return Promise.reject(new PromptInterruptedError());
      }
      if (closed) {
        return Promise.reject(new PromptClosedError());
      }
      return new Promise<string>((resolve, reject) => {
        pending = { resolve, reject };
        rl.question(question, (answer) => {
          pending = null;
          resolve(answer);
        });
      });
    },
    close() {
      if (!closed) {
        rl.close();
      }
    }
  } satisfies MenuPrompt;
}
