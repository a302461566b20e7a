import * as p from '@clack/prompts';
import * as readline from 'readline';
import { IPrompter } from '../interfaces';

const INVALID_ANSWER = 'Answer Y or n';

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Map a typed answer to a decision. Empty input accepts; anything other
 * than Y/y/N/n is unanswered.
 */
export function parseAnswer(input: string | undefined): boolean | undefined {
  switch (input ?? '') {
  case '':
  case 'Y':
  case 'y':
    return true;
  case 'N':
  case 'n':
    return false;
  default:
    return undefined;
  }
}

/**
 * Line-at-a-time reader over a non-interactive stream. Lines that arrive
 * before they are asked for are queued; once the stream ends every read
 * resolves to undefined.
 */
class LineQueue {
  private lines: string[] = [];
  private waiting: Array<(line: string | undefined) => void> = [];
  private closed = false;
  private reader: readline.Interface;

  constructor(input: NodeJS.ReadableStream) {
    this.reader = readline.createInterface({ input, terminal: false });
    this.reader.on('line', line => this.push(line));
    this.reader.on('close', () => this.close());
  }

  next(): Promise<string | undefined> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    this.reader.resume();
    return new Promise(resolve => this.waiting.push(resolve));
  }

  private push(line: string): void {
    const resolve = this.waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      this.lines.push(line);
    }

    // Idle input must not keep the process alive between questions
    if (this.waiting.length === 0) {
      this.reader.pause();
    }
  }

  private close(): void {
    this.closed = true;
    this.waiting.splice(0).forEach(resolve => resolve(undefined));
  }
}

/**
 * Yes/no prompt. A terminal gets an interactive prompt; piped input is
 * read line by line. Invalid answers are asked again; cancelling or
 * closing input declines.
 */
export class ConsolePrompter implements IPrompter {
  private input: PromptInput;
  private output: NodeJS.WritableStream;
  private lineQueue?: LineQueue;

  constructor(input: PromptInput = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async confirm(question: string): Promise<boolean> {
    return this.input.isTTY ? this.confirmInteractive(question) : this.confirmFromLines(question);
  }

  private async confirmInteractive(question: string): Promise<boolean> {
    const value = await p.text({
      message: `${question} (Y/n)`,
      placeholder: 'Y',
      validate: input => (parseAnswer(input) === undefined ? INVALID_ANSWER : undefined)
    });

    if (p.isCancel(value)) {
      return false;
    }

    return parseAnswer(value) ?? false;
  }

  private async confirmFromLines(question: string): Promise<boolean> {
    this.lineQueue ??= new LineQueue(this.input);

    for (;;) {
      this.output.write(`${question} (Y/n) `);

      const line = await this.lineQueue.next();
      if (line === undefined) {
        this.output.write('\n');
        return false;
      }

      const answer = parseAnswer(line.trim());
      if (answer !== undefined) {
        return answer;
      }

      this.output.write(`${INVALID_ANSWER}\n`);
    }
  }
}
