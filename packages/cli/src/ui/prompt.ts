import { createInterface, type Interface } from "node:readline";

import { UsageError } from "@contestcal/shared";

export interface Prompter {
  /** Show `question` and resolve with the next line of input. */
  ask(question: string): Promise<string>;
  /** Like ask, but the typed characters are not echoed. */
  askSecret(question: string): Promise<string>;
  say(message?: string): void;
  close(): void;
}

interface LineReader {
  rl: Interface;
  lines: AsyncIterator<string>;
}

function readHiddenLine(question: string): Promise<string> {
  const stdin = process.stdin;
  const stdout = process.stdout;

  return new Promise((resolvePromise, rejectPromise) => {
    let value = "";
    stdout.write(question);
    stdin.setRawMode(true);
    stdin.resume();
    stdin.setEncoding("utf8");

    const stop = (): void => {
      stdin.off("data", handler);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write("\n");
    };

    const handler = (chunk: string): void => {
      for (const ch of chunk) {
        if (ch === "\r" || ch === "\n" || ch === "\u0004") {
          stop();
          resolvePromise(value);
          return;
        }
        if (ch === "\u0003") {
          stop();
          rejectPromise(new UsageError("Cancelled"));
          return;
        }
        if (ch === "\u007f" || ch === "\b") {
          value = value.slice(0, -1);
          continue;
        }
        value += ch;
      }
    };

    stdin.on("data", handler);
  });
}

/**
 * Prompter over process.stdin/stdout. Lines are read through one async
 * iterator so piped input is not dropped between questions; secrets on a
 * TTY are read in raw mode with the line reader closed.
 */
export function createTerminalPrompter(): Prompter {
  let reader: LineReader | null = null;

  const open = (): LineReader => {
    if (!reader) {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      reader = { rl, lines: rl[Symbol.asyncIterator]() };
    }
    return reader;
  };

  const closeReader = (): void => {
    reader?.rl.close();
    reader = null;
  };

  const ask = async (question: string): Promise<string> => {
    const { rl, lines } = open();
    rl.setPrompt(question);
    rl.prompt();
    const next = await lines.next();
    if (next.done) throw new UsageError("Input ended before all questions were answered");
    return next.value;
  };

  return {
    ask,
    async askSecret(question) {
      if (!process.stdin.isTTY) return ask(question);
      closeReader();
      return readHiddenLine(question);
    },
    say(message = "") {
      console.log(message);
    },
    close: closeReader,
  };
}
