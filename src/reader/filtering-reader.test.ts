import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FilteringReader, withFilteringReader } from './filtering-reader.js';
import { ArrayLineSource, type LineSource, StringLineSource } from './line-source.js';
import { ReaderConfiguration } from './reader.config.js';
import { InvalidArgumentError, ReaderClosedError } from './reader.errors.js';

function readAllChars(reader: FilteringReader): Array<string | null> {
  const chars: Array<string | null> = [];
  for (;;) {
    const ch = reader.readChar();
    chars.push(ch);
    if (ch === null) {
      return chars;
    }
  }
}

describe('FilteringReader', () => {
  describe('construction', () => {
    it('should reject an empty path', () => {
      expect(() => new FilteringReader('')).toThrow(InvalidArgumentError);
    });

    it('should reject a whitespace-only path and name the argument', () => {
      try {
        new FilteringReader('  \t ');
        expect.fail('expected the constructor to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidArgumentError);
        if (error instanceof InvalidArgumentError) {
          expect(error.argument).toBe('path');
        }
      }
    });

    it('should reject a missing source', () => {
      const missing = null as unknown as LineSource;

      expect(() => new FilteringReader(missing)).toThrow('A line source is required');
    });

    it('should reject an explicit null configuration', () => {
      const config = null as unknown as ReaderConfiguration;

      expect(() => new FilteringReader(new ArrayLineSource([]), config)).toThrow(
        'Configuration cannot be null'
      );
    });

    it('should default to a pass-through configuration', () => {
      const reader = new FilteringReader(new ArrayLineSource([]));

      expect(reader.config.toOptions()).toEqual(new ReaderConfiguration().toOptions());
    });

    it('should keep a reference to the supplied configuration', () => {
      const config = new ReaderConfiguration();
      const reader = new FilteringReader(new ArrayLineSource([]), config);

      expect(reader.config).toBe(config);
    });
  });

  describe('with a file path', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'filtering-reader-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should open and filter the file', () => {
      const path = join(dir, 'settings.conf');
      writeFileSync(path, '# generated\nhost=localhost\n\nport=8080\n');
      const config = ReaderConfiguration.fromOptions({
        skipEmptyOrNull: true,
        skipStartingWith: ['#'],
      });

      const lines = withFilteringReader(path, config, (reader) => [...reader]);

      expect(lines).toEqual(['host=localhost', 'port=8080']);
    });

    it('should pass the open error through for a missing file', () => {
      expect(() => new FilteringReader(join(dir, 'missing.txt'))).toThrow(/ENOENT/);
    });
  });

  describe('readLine', () => {
    it('should reproduce the source with a default configuration', () => {
      const lines = ['alpha', '', '  beta  ', '# not a comment here', '\t'];
      const reader = new FilteringReader(new ArrayLineSource(lines));

      expect([...reader]).toEqual(lines);
      expect(reader.readLine()).toBeNull();
    });

    it('should drop empty, commented and over-long lines', () => {
      const source = new ArrayLineSource(['', '  ', 'keep', '# comment', 'toolong-line-here']);
      const config = new ReaderConfiguration();
      config.skipEmptyOrNull = true;
      config.skipStartingWith.push('#');
      config.maxLineLength = 10;

      const reader = new FilteringReader(source, config);

      expect(reader.readLine()).toBe('  ');
      expect(reader.readLine()).toBe('keep');
      expect(reader.readLine()).toBeNull();
    });

    it('should let trimming turn whitespace-only lines into empty ones', () => {
      const config = new ReaderConfiguration();
      config.trimLines = true;
      config.skipEmptyOrNull = true;

      const reader = new FilteringReader(new ArrayLineSource(['  padded  ', '   ', '\tx']), config);

      expect([...reader]).toEqual(['padded', 'x']);
    });

    it('should keep a line holding only a byte order mark after trimming', () => {
      const config = ReaderConfiguration.fromOptions({
        trimLines: true,
        skipEmptyOrNull: true,
        skipWhitespaceOnly: true,
      });

      const reader = new FilteringReader(new ArrayLineSource([' \uFEFF ', '  ', 'end']), config);

      expect([...reader]).toEqual(['\uFEFF', 'end']);
    });

    it('should return the end marker when every line is skipped', () => {
      const config = new ReaderConfiguration();
      config.skipContaining.push('');

      const reader = new FilteringReader(new ArrayLineSource(['a', 'b', 'c']), config);

      expect(reader.readLine()).toBeNull();
      expect(reader.peekChar()).toBeNull();
    });

    it('should apply configuration changes from the next line on', () => {
      const config = new ReaderConfiguration();
      const reader = new FilteringReader(
        new ArrayLineSource(['one', '#two', 'three', '#four']),
        config
      );

      expect(reader.readLine()).toBe('one');
      config.skipStartingWith.push('#');
      expect(reader.readLine()).toBe('three');
      expect(reader.readLine()).toBeNull();
    });
  });

  describe('character reads', () => {
    it('should emit CRLF after every line including the last', () => {
      const reader = new FilteringReader(new ArrayLineSource(['ab', 'cd']));

      expect(readAllChars(reader)).toEqual(['a', 'b', '\r', '\n', 'c', 'd', '\r', '\n', null]);
      expect(reader.readChar()).toBeNull();
    });

    it('should normalise source terminators to CRLF', () => {
      const reader = new FilteringReader(new StringLineSource('ab\ncd\r\n'));

      expect(reader.readToEnd()).toBe('ab\r\ncd\r\n');
      expect(reader.readToEnd()).toBe('');
    });

    it('should emit only a terminator for an empty line', () => {
      const reader = new FilteringReader(new ArrayLineSource(['', 'x']));

      expect(reader.readToEnd()).toBe('\r\nx\r\n');
    });

    it('should only emit characters of lines that pass the filter', () => {
      const config = new ReaderConfiguration();
      config.skipEndingWith.push(';');

      const reader = new FilteringReader(new ArrayLineSource(['a;', 'b', 'c;']), config);

      expect(reader.readToEnd()).toBe('b\r\n');
    });

    it('should peek without consuming', () => {
      const reader = new FilteringReader(new ArrayLineSource(['ab']));

      expect(reader.peekChar()).toBe('a');
      expect(reader.peekChar()).toBe('a');
      expect(reader.readChar()).toBe('a');
      expect(reader.peekChar()).toBe('b');
      expect(reader.readChar()).toBe('b');
      expect(reader.readChar()).toBe('\r');
    });

    it('should report the end marker from peek repeatedly', () => {
      const reader = new FilteringReader(new ArrayLineSource([]));

      expect(reader.peekChar()).toBeNull();
      expect(reader.peekChar()).toBeNull();
      expect(reader.readChar()).toBeNull();
    });

    it('should read characters in blocks', () => {
      const reader = new FilteringReader(new StringLineSource('abc\ndef'));

      expect(reader.readChars(0)).toBe('');
      expect(reader.readChars(4)).toBe('abc\r');
      expect(reader.readChars(10)).toBe('\ndef\r\n');
      expect(reader.readChars(1)).toBeNull();
    });

    it('should reject a negative or fractional block size', () => {
      const reader = new FilteringReader(new ArrayLineSource(['abc']));

      expect(() => reader.readChars(-1)).toThrow(InvalidArgumentError);
      expect(() => reader.readChars(1.5)).toThrow(InvalidArgumentError);
    });
  });

  describe('mixing line and character reads', () => {
    it('should return the rest of a partly read line', () => {
      const reader = new FilteringReader(new ArrayLineSource(['hello', 'world']));

      expect(reader.readChar()).toBe('h');
      expect(reader.peekChar()).toBe('e');
      expect(reader.readLine()).toBe('ello');
      expect(reader.readLine()).toBe('world');
      expect(reader.readChar()).toBeNull();
    });

    it('should return an empty string when only the terminator is left', () => {
      const reader = new FilteringReader(new ArrayLineSource(['hi', 'next']));

      expect(reader.readChars(2)).toBe('hi');
      expect(reader.peekChar()).toBe('\r');
      expect(reader.readLine()).toBe('');
      expect(reader.readChar()).toBe('n');
    });

    it('should return an empty string after the carriage return was read', () => {
      const reader = new FilteringReader(new ArrayLineSource(['hi', 'next']));

      expect(reader.readChars(3)).toBe('hi\r');
      expect(reader.readLine()).toBe('');
      expect(reader.readLine()).toBe('next');
    });

    it('should return the end marker after peeking past the last line', () => {
      const reader = new FilteringReader(new ArrayLineSource(['a']));

      expect(reader.readToEnd()).toBe('a\r\n');
      expect(reader.readLine()).toBeNull();
    });
  });

  describe('close', () => {
    it('should close the source exactly once', () => {
      const source = new ArrayLineSource(['x']);
      const closeSpy = vi.spyOn(source, 'close');
      const reader = new FilteringReader(source);

      reader.close();
      reader.close();

      expect(closeSpy).toHaveBeenCalledTimes(1);
      expect(reader.isClosed).toBe(true);
    });

    it('should refuse reads after close', () => {
      const reader = new FilteringReader(new ArrayLineSource(['x']));
      reader.close();

      expect(() => reader.readLine()).toThrow(ReaderClosedError);
      expect(() => reader.readChar()).toThrow(ReaderClosedError);
      expect(() => reader.peekChar()).toThrow(ReaderClosedError);
      expect(() => reader.readToEnd()).toThrow(ReaderClosedError);
    });

    it('should leave the configuration untouched', () => {
      const config = ReaderConfiguration.fromOptions({ skipContaining: ['x'] });
      const reader = new FilteringReader(new ArrayLineSource([]), config);

      reader.close();

      expect(config.skipContaining).toEqual(['x']);
    });
  });

  describe('withFilteringReader', () => {
    it('should return the callback result and close the reader', () => {
      const source = new ArrayLineSource(['a', 'b']);
      const closeSpy = vi.spyOn(source, 'close');

      const lines = withFilteringReader(source, undefined, (reader) => [...reader]);

      expect(lines).toEqual(['a', 'b']);
      expect(closeSpy).toHaveBeenCalledTimes(1);
    });

    it('should close the reader when the callback throws', () => {
      const source = new ArrayLineSource(['a']);
      const closeSpy = vi.spyOn(source, 'close');

      expect(() =>
        withFilteringReader(source, undefined, () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(closeSpy).toHaveBeenCalledTimes(1);
    });
  });
});
