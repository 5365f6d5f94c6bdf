import { closeSync, openSync, readSync } from 'fs';
import { StringDecoder } from 'string_decoder';
import { config, type ReaderEncoding, readerEncodings } from '../config/config.service.js';
import { logger } from '../utils/logger/logger.service.js';
import { InvalidArgumentError, ReaderClosedError } from './reader.errors.js';

/**
 * A synchronous supplier of text lines.
 */
export interface LineSource {
  /**
   * Read the next line without its terminator
   * @returns the line, or null once the source is exhausted
   */
  readLine(): string | null;

  /**
   * Release the underlying resource. Calling it again has no effect.
   */
  close(): void;
}

export interface FileLineSourceOptions {
  encoding?: ReaderEncoding;
  chunkSize?: number;
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Splits decoded text into lines on `\n`, `\r\n` or a lone `\r`. A terminator
 * at the very end of the text does not yield an extra empty line.
 */
abstract class BufferedLineSource implements LineSource {
  private buffer = '';
  private position = 0;
  private exhausted = false;
  private closed = false;

  /**
   * Pull the next piece of decoded text, or null when there is no more.
   */
  protected abstract readChunk(): string | null;

  protected abstract release(): void;

  readLine(): string | null {
    if (this.closed) {
      throw new ReaderClosedError('Cannot read from a closed line source');
    }

    for (;;) {
      const terminator = this.findTerminator();

      if (terminator !== -1) {
        const isCarriageReturn = this.buffer[terminator] === '\r';

        // A trailing \r may be the first half of a \r\n split across chunks
        if (isCarriageReturn && terminator === this.buffer.length - 1 && !this.exhausted) {
          this.pull();
          continue;
        }

        const line = this.buffer.slice(this.position, terminator);
        const width = isCarriageReturn && this.buffer[terminator + 1] === '\n' ? 2 : 1;
        this.position = terminator + width;
        return line;
      }

      if (this.exhausted) {
        if (this.position < this.buffer.length) {
          const line = this.buffer.slice(this.position);
          this.buffer = '';
          this.position = 0;
          return line;
        }
        return null;
      }

      this.pull();
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer = '';
    this.position = 0;
    this.release();
  }

  private findTerminator(): number {
    for (let i = this.position; i < this.buffer.length; i++) {
      const ch = this.buffer[i];
      if (ch === '\n' || ch === '\r') {
        return i;
      }
    }
    return -1;
  }

  private pull(): void {
    const chunk = this.readChunk();
    if (chunk === null) {
      this.exhausted = true;
      return;
    }
    this.buffer = this.buffer.slice(this.position) + chunk;
    this.position = 0;
  }
}

/**
 * Line source over an in-memory string.
 */
export class StringLineSource extends BufferedLineSource {
  private pending: string | null;

  constructor(text: string) {
    super();
    this.pending = text;
  }

  protected readChunk(): string | null {
    const chunk = this.pending;
    this.pending = null;
    return chunk;
  }

  protected release(): void {
    this.pending = null;
  }
}

/**
 * Line source over lines already split in memory. Entries are returned as
 * given, even when they contain terminator characters.
 */
export class ArrayLineSource implements LineSource {
  private index = 0;
  private closed = false;

  constructor(private readonly entries: readonly string[]) {}

  readLine(): string | null {
    if (this.closed) {
      throw new ReaderClosedError('Cannot read from a closed line source');
    }
    if (this.index >= this.entries.length) {
      return null;
    }
    return this.entries[this.index++];
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Line source reading a file synchronously in fixed-size chunks.
 * Opening errors (missing file, permissions) are thrown as-is.
 */
export class FileLineSource extends BufferedLineSource {
  readonly path: string;
  private readonly fd: number;
  private readonly decoder: StringDecoder;
  private readonly chunk: Buffer;
  private decoderDone = false;
  private atStart = true;

  constructor(path: string, options: FileLineSourceOptions = {}) {
    super();

    const encoding = options.encoding ?? config.reader.encoding;
    const chunkSize = options.chunkSize ?? config.reader.chunkSize;

    if (!readerEncodings.includes(encoding)) {
      throw new InvalidArgumentError(`Unsupported encoding: ${encoding}`, 'encoding');
    }
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new InvalidArgumentError('Chunk size must be a positive integer', 'chunkSize');
    }

    // Allocate first so nothing can throw once the descriptor is open
    this.chunk = Buffer.alloc(chunkSize);
    this.decoder = new StringDecoder(encoding);
    this.path = path;
    this.fd = openSync(path, 'r');

    logger.debug(`Opened line source ${path} (${encoding}, ${chunkSize} byte chunks)`);
  }

  protected readChunk(): string | null {
    if (this.decoderDone) {
      return null;
    }

    const bytesRead = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
    let text: string;
    if (bytesRead === 0) {
      this.decoderDone = true;
      text = this.decoder.end();
      if (text.length === 0) {
        return null;
      }
    } else {
      text = this.decoder.write(this.chunk.subarray(0, bytesRead));
    }

    if (this.atStart && text.length > 0) {
      this.atStart = false;
      if (text.startsWith(BYTE_ORDER_MARK)) {
        text = text.slice(BYTE_ORDER_MARK.length);
      }
    }

    return text;
  }

  protected release(): void {
    closeSync(this.fd);
    logger.debug(`Closed line source ${this.path}`);
  }
}
