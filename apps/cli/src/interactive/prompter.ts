import { createInterface } from 'node:readline';

export interface LinePrompter {
  /** Write the question and wait for the next line. Null once input has ended. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Line-at-a-time prompter over any stream pair. Lines that arrive before
 * they are asked for are queued, so piped input works too.
 */
export function createLinePrompter(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): LinePrompter {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question) {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value.trim();
    },
    close() {
      rl.close();
    },
  };
}
