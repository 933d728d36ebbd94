/**
 * Parser for text scene files.
 *
 * A text scene is a stream of `;`-terminated command statements that may span
 * several lines. Only two commands carry dependencies: `file` (references to
 * other scenes) and `setAttr` on a file-texture attribute. Every other command
 * is skipped without being tokenized.
 */
import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { TEXTURE_PATH_ATTRIBUTES } from './constants/scene-files.js';
import { attributeShortName } from './utils/attribute-names.js';

/**
 * Pull-based line reader. Lines come back without their `\n`; `null` marks the end.
 */
export interface LineSource {
  readLine(): string | null;
}

export class BufferLineSource implements LineSource {
  private offset = 0;
  private readonly text: string;

  constructor(content: Buffer | string) {
    this.text = typeof content === 'string' ? content : content.toString('utf8');
  }

  readLine(): string | null {
    if (this.offset >= this.text.length) {
      return null;
    }
    const newline: number = this.text.indexOf('\n', this.offset);
    const end: number = newline === -1 ? this.text.length : newline;
    const line: string = this.text.slice(this.offset, end);
    this.offset = end + 1;
    return line;
  }
}

/**
 * Reads a file in fixed-size blocks, holding at most one block plus a partial
 * line in memory. Call {@link close} when done.
 */
export class FileLineSource implements LineSource {
  private readonly fd: number;
  private readonly block: Buffer;
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  private exhausted = false;
  private closed = false;

  constructor(filePath: string, blockSize = 64 * 1024) {
    this.fd = openSync(filePath, 'r');
    this.block = Buffer.alloc(blockSize);
  }

  readLine(): string | null {
    let newline: number = this.pending.indexOf('\n');
    while (newline === -1 && !this.exhausted) {
      this.fill();
      newline = this.pending.indexOf('\n');
    }
    if (newline !== -1) {
      const line: string = this.pending.slice(0, newline);
      this.pending = this.pending.slice(newline + 1);
      return line;
    }
    if (this.pending.length > 0) {
      const line: string = this.pending;
      this.pending = '';
      return line;
    }
    return null;
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      closeSync(this.fd);
    }
  }

  private fill(): void {
    const bytesRead: number = readSync(this.fd, this.block, 0, this.block.length, null);
    if (bytesRead === 0) {
      this.exhausted = true;
      this.pending += this.decoder.end();
      return;
    }
    this.pending += this.decoder.write(this.block.subarray(0, bytesRead));
  }
}

/**
 * One command with its argument text, before tokenization.
 */
export interface Statement {
  readonly command: string;
  /** Argument text per physical line; the first holds the rest of the command line. */
  readonly fragments: readonly string[];
}

/**
 * Groups physical lines into statements. Comment lines are dropped and the
 * closing `;` is removed.
 */
export function* readStatements(source: LineSource): Generator<Statement, void, undefined> {
  for (;;) {
    const lines: string[] = [];
    let line: string | null = source.readLine();
    while (line !== null) {
      if (!line.startsWith('//')) {
        const trimmed: string = line.replace(/[\r\n]+$/, '');
        if (trimmed.endsWith(';')) {
          lines.push(trimmed.slice(0, -1));
          break;
        }
        if (trimmed.length > 0) {
          lines.push(trimmed);
        }
      }
      line = source.readLine();
    }

    if (lines.length === 0) {
      return;
    }

    const first: string = lines[0];
    const space: number = first.indexOf(' ');
    const command: string = (space === -1 ? first : first.slice(0, space)).trimStart();
    const rest: string = space === -1 ? '' : first.slice(space + 1);
    yield { command, fragments: [rest, ...lines.slice(1)] };
  }
}

/**
 * Splits an argument fragment into tokens. Quoted tokens keep their content
 * verbatim, including escape backslashes; a backslash stops the next character
 * from closing the quote. An unterminated quote runs to the end of the fragment.
 */
export function tokenize(fragment: string): string[] {
  const tokens: string[] = [];
  let rest: string = fragment;

  for (;;) {
    rest = rest.trim();
    if (rest.length === 0) {
      return tokens;
    }

    const quote: string = rest[0];
    if (quote === '"' || quote === "'") {
      let escaped = false;
      let end: number = rest.length;
      for (let i = 1; i < rest.length; i++) {
        const char: string = rest[i];
        if (!escaped && char === quote) {
          end = i;
          break;
        }
        escaped = !escaped && char === '\\';
      }
      tokens.push(rest.slice(1, end));
      rest = rest.slice(end + 1);
    } else {
      const match: RegExpExecArray | null = /\s/.exec(rest);
      if (match === null) {
        tokens.push(rest);
        rest = '';
      } else {
        tokens.push(rest.slice(0, match.index));
        rest = rest.slice(match.index + 1);
      }
    }
  }
}

/** Tokens of every fragment of a statement, in order. */
export function statementArguments(statement: Statement): string[] {
  return statement.fragments.flatMap((fragment: string) => tokenize(fragment));
}

/** `file` flags and how many tokens each spans, the flag included. */
const FILE_FLAG_SPANS: ReadonlyMap<string, number> = new Map([
  ['-r', 1],
  ['--reference', 1],
  ['-rdi', 2],
  ['--referenceDepthInfo', 2],
  ['-ns', 2],
  ['--namespace', 2],
  ['-dr', 2],
  ['--deferReference', 2],
  ['-rfn', 2],
  ['--referenceNode', 2],
  ['-op', 2],
  ['--options', 2],
  ['-typ', 2],
  ['--type', 2],
]);

export interface SceneTextParserOptions {
  readonly textureAttributes?: readonly string[];
}

export class SceneTextParser {
  private readonly referencePaths: string[] = [];
  private readonly textureAttributes: readonly string[];
  private readonly handlers: ReadonlyMap<string, (args: string[]) => void>;

  constructor(options: SceneTextParserOptions = {}) {
    this.textureAttributes = options.textureAttributes ?? TEXTURE_PATH_ATTRIBUTES;
    this.handlers = new Map([
      ['file', (args: string[]): void => this.handleFile(args)],
      ['setAttr', (args: string[]): void => this.handleSetAttr(args)],
    ]);
  }

  /**
   * Parses a text scene held in memory.
   */
  static parseBuffer({ content, textureAttributes }: { readonly content: Buffer | string; readonly textureAttributes?: readonly string[] }): string[] {
    const parser = new SceneTextParser({ textureAttributes });
    parser.parse(new BufferLineSource(content));
    return parser.getDependencyPaths();
  }

  /**
   * Parses a text scene straight from disk without loading it whole.
   */
  static parseFile({ filePath, textureAttributes }: { readonly filePath: string; readonly textureAttributes?: readonly string[] }): string[] {
    const source = new FileLineSource(filePath);
    try {
      const parser = new SceneTextParser({ textureAttributes });
      parser.parse(source);
      return parser.getDependencyPaths();
    } finally {
      source.close();
    }
  }

  parse(source: LineSource): void {
    for (const statement of readStatements(source)) {
      this.handleStatement(statement);
    }
  }

  handleStatement(statement: Statement): void {
    const handler = this.handlers.get(statement.command);
    if (handler !== undefined) {
      handler(statementArguments(statement));
    }
  }

  /** Reference paths in first-seen order, then texture paths as encountered. */
  getDependencyPaths(): string[] {
    return [...this.referencePaths];
  }

  private handleFile(args: string[]): void {
    let index = 0;
    while (index < args.length) {
      const span: number | undefined = FILE_FLAG_SPANS.get(args[index]);
      if (span === undefined) {
        break;
      }
      index += span;
    }

    if (index < args.length) {
      const filePath: string = args[index];
      if (!this.referencePaths.includes(filePath)) {
        this.referencePaths.push(filePath);
      }
    }
  }

  private handleSetAttr(args: string[]): void {
    if (args.length === 0) {
      return;
    }
    const name: string = attributeShortName(args[0]);
    const rest: string[] = args.slice(1);

    let attributeType: string | null = null;
    let values: string[] = [];
    const typeFlag: number = rest.findIndex((arg: string) => arg === '-type' || arg === '--type');
    if (typeFlag !== -1 && typeFlag + 1 < rest.length) {
      attributeType = rest[typeFlag + 1];
      values = rest.slice(typeFlag + 2);
    }

    const value: string = values.length > 0 ? values.join(' ') : args[args.length - 1];
    if ((attributeType ?? 'string') === 'string' && this.textureAttributes.includes(name)) {
      this.referencePaths.push(value);
    }
  }
}
