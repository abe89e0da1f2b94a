// Line sources for the router: an interactive readline prompt and a scripted one

import { createInterface, type Interface } from 'node:readline';

export interface LineReader {
  /** Resolves the next line, or null at end of input */
  read(prompt: string): Promise<string | null>;
  /** Words offered by tab completion for the current menu */
  setCompletions?(words: readonly string[]): void;
  close(): void;
}

export class ReadlineLineReader implements LineReader {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private completions: readonly string[] = [];

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({
      input,
      output,
      completer: (line: string): [string[], string] => this.complete(line),
    });
    // Ctrl+C ends input the same way Ctrl+D does
    this.rl.on('SIGINT', () => this.rl.close());
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async read(prompt: string): Promise<string | null> {
    this.rl.setPrompt(prompt);
    this.rl.prompt();
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  setCompletions(words: readonly string[]): void {
    this.completions = words;
  }

  complete(line: string): [string[], string] {
    const hits = this.completions.filter(word => word.startsWith(line));
    return [hits.length > 0 ? hits : [...this.completions], line];
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Replays a fixed list of lines, then reports end of input. Used for
 * `marketshell load -t AAPL/ta/ema` style invocations.
 */
export class ScriptedLineReader implements LineReader {
  private index = 0;

  constructor(
    private readonly lines: readonly string[],
    private readonly echo?: (text: string) => void,
  ) {}

  async read(prompt: string): Promise<string | null> {
    const line = this.lines[this.index];
    if (line === undefined) return null;
    this.index++;
    this.echo?.(`${prompt}${line}`);
    return line;
  }

  close(): void {
    this.index = this.lines.length;
  }
}

/** Split a command-line script on `/` into one menu line per segment */
export function splitScript(argv: readonly string[]): string[] {
  return argv
    .join(' ')
    .split('/')
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}
