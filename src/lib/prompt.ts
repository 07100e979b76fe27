import { createInterface, type Interface } from 'readline';
import { Writable } from 'stream';

export interface AskOptions {
  secret?: boolean;
}

/**
 * Supplies values the user would otherwise type at a prompt
 */
export interface ValueProvider {
  ask(question: string, options?: AskOptions): Promise<string>;
}

export interface TerminalProvider extends ValueProvider {
  close(): void;
}

/**
 * Output stream that can stop echoing while a secret is typed
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Prompt on the controlling terminal. Secrets are read without echo.
 *
 * One readline interface serves every question. Lines that arrive before
 * they are asked for (piped input) are queued, not dropped.
 */
export function createTerminalProvider(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalProvider {
  const echo = new MutableOutput(output);
  const lines: string[] = [];
  const waiters: Waiter[] = [];
  let rl: Interface | null = null;
  let closed = false;

  function open(): Interface {
    if (rl) {
      return rl;
    }
    rl = createInterface({
      input,
      output: echo,
      terminal: 'isTTY' in input && input.isTTY === true,
    });
    rl.on('line', line => {
      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        lines.push(line);
      }
    });
    rl.on('close', () => {
      closed = true;
      for (const waiter of waiters.splice(0)) {
        waiter.reject(new Error('Input closed before an answer was given'));
      }
    });
    return rl;
  }

  function nextLine(): Promise<string> {
    open();
    const queued = lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (closed) {
      return Promise.reject(new Error('Input closed before an answer was given'));
    }
    return new Promise((resolve, reject) => {
      waiters.push({ resolve, reject });
    });
  }

  return {
    async ask(question: string, options: AskOptions = {}): Promise<string> {
      output.write(question);
      if (!options.secret) {
        return nextLine();
      }

      echo.muted = true;
      try {
        return await nextLine();
      } finally {
        echo.muted = false;
        output.write('\n');
      }
    },

    close(): void {
      rl?.close();
    },
  };
}
