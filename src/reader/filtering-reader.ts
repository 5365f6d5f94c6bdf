import { logger } from '../utils/logger/logger.service.js';
import { charCountSchema } from '../utils/validators/reader.schemas.js';
import { isWhitespaceOnly, shouldSkipLine, trimLine } from './line-filter.js';
import { FileLineSource, type LineSource } from './line-source.js';
import { ReaderConfiguration } from './reader.config.js';
import { InvalidArgumentError, ReaderClosedError } from './reader.errors.js';

/** Appended to every line handed to the character path. */
export const LINE_TERMINATOR = '\r\n';

type CharSlot = { kind: 'empty' } | { kind: 'eof' } | { kind: 'char'; value: string };

const EMPTY_SLOT: CharSlot = { kind: 'empty' };
const EOF_SLOT: CharSlot = { kind: 'eof' };

/**
 * Reads text through a line source while hiding the lines its configuration
 * rejects. Lines come out whole through `readLine`, or one character at a time
 * through `readChar`/`peekChar` with `\r\n` after every line.
 *
 * The reader owns the line source and closes it; the configuration stays with
 * the caller and may be edited between reads.
 */
export class FilteringReader implements Iterable<string> {
  readonly config: ReaderConfiguration;
  private readonly source: LineSource;
  private charCache: CharSlot = EMPTY_SLOT;
  private currentLine: string | null = null;
  private cursor = 0;
  private closed = false;

  /**
   * @param source path of a text file to open, or an already-open line source
   * @param config filter rules; a pass-through configuration when omitted
   * @throws InvalidArgumentError for a blank path, a missing source or a null config
   */
  constructor(source: string | LineSource, config: ReaderConfiguration = new ReaderConfiguration()) {
    if (source === null || source === undefined) {
      throw new InvalidArgumentError('A line source is required', 'source');
    }
    if (typeof source === 'string' && isWhitespaceOnly(source)) {
      throw new InvalidArgumentError('Path cannot be empty or whitespace', 'path');
    }
    if (config === null) {
      throw new InvalidArgumentError('Configuration cannot be null', 'config');
    }

    this.source = typeof source === 'string' ? new FileLineSource(source) : source;
    this.config = config;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Next line that passes the filter, without its terminator, or null at the
   * end of the source. When the character path has consumed part of a line,
   * the rest of that line is returned first.
   */
  readLine(): string | null {
    this.ensureOpen();

    if (this.charCache.kind === 'eof') {
      return null;
    }

    if (this.charCache.kind === 'char' || this.currentLine !== null) {
      let rest = this.charCache.kind === 'char' ? this.charCache.value : '';
      if (this.currentLine !== null) {
        rest += this.currentLine.slice(this.cursor);
      }
      this.charCache = EMPTY_SLOT;
      this.currentLine = null;
      this.cursor = 0;
      return stripTerminator(rest);
    }

    return this.getLine();
  }

  /**
   * Next character without consuming it, or null at the end of the source.
   */
  peekChar(): string | null {
    this.ensureOpen();
    const slot = this.fillCharCache();
    return slot.kind === 'char' ? slot.value : null;
  }

  /**
   * Next character, or null at the end of the source.
   */
  readChar(): string | null {
    this.ensureOpen();
    const slot = this.fillCharCache();
    if (slot.kind === 'char') {
      this.charCache = EMPTY_SLOT;
      return slot.value;
    }
    return null;
  }

  /**
   * Up to `count` characters, or null when the source is already exhausted.
   */
  readChars(count: number): string | null {
    this.ensureOpen();

    const parsed = charCountSchema.safeParse(count);
    if (!parsed.success) {
      throw new InvalidArgumentError(parsed.error.errors[0]?.message ?? 'Invalid count', 'count');
    }

    let text = '';
    while (text.length < parsed.data) {
      const ch = this.readChar();
      if (ch === null) {
        return text.length > 0 ? text : null;
      }
      text += ch;
    }
    return text;
  }

  readToEnd(): string {
    this.ensureOpen();

    const parts: string[] = [];
    for (let ch = this.readChar(); ch !== null; ch = this.readChar()) {
      parts.push(ch);
    }
    return parts.join('');
  }

  *lines(): Generator<string, void, undefined> {
    for (let line = this.readLine(); line !== null; line = this.readLine()) {
      yield line;
    }
  }

  [Symbol.iterator](): Iterator<string> {
    return this.lines();
  }

  /**
   * Close the underlying source. Only the first call has an effect.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.charCache = EMPTY_SLOT;
    this.currentLine = null;
    this.source.close();
    logger.debug('Filtering reader closed');
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ReaderClosedError();
    }
  }

  private fillCharCache(): CharSlot {
    if (this.charCache.kind === 'empty') {
      this.charCache = this.nextChar();
    }
    return this.charCache;
  }

  private nextChar(): CharSlot {
    if (this.currentLine === null) {
      const line = this.getLine();
      if (line === null) {
        return EOF_SLOT;
      }
      this.currentLine = line + LINE_TERMINATOR;
      this.cursor = 0;
    }

    const value = this.currentLine[this.cursor];
    this.cursor++;
    if (this.cursor >= this.currentLine.length) {
      this.currentLine = null;
      this.cursor = 0;
    }
    return { kind: 'char', value };
  }

  private getLine(): string | null {
    for (;;) {
      let line = this.source.readLine();
      if (line === null) {
        return null;
      }

      if (this.config.trimLines) {
        line = trimLine(line);
      }

      if (!shouldSkipLine(line, this.config)) {
        return line;
      }
    }
  }
}

function stripTerminator(rest: string): string {
  if (rest.endsWith(LINE_TERMINATOR)) {
    return rest.slice(0, -LINE_TERMINATOR.length);
  }
  if (rest.endsWith('\n')) {
    return rest.slice(0, -1);
  }
  return rest;
}

/**
 * Create a reader, hand it to `fn` and close it however `fn` exits.
 */
export function withFilteringReader<T>(
  source: string | LineSource,
  config: ReaderConfiguration | undefined,
  fn: (reader: FilteringReader) => T
): T {
  const reader = new FilteringReader(source, config);
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}
