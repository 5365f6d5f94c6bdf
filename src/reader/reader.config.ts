import {
  type ReaderOptions,
  type ResolvedReaderOptions,
  readerOptionsSchema,
} from '../utils/validators/reader.schemas.js';
import { InvalidArgumentError } from './reader.errors.js';

/** Sentinel for a length rule that is switched off. */
export const LENGTH_NOT_SET = -1;

/**
 * Rules deciding which lines a FilteringReader hides.
 *
 * A reader keeps a reference to its configuration and reads it again for every
 * line, so edits made between reads apply from the next line on. A fresh
 * instance has every rule disabled.
 */
export class ReaderConfiguration {
  /** Trim leading and trailing whitespace before any rule runs. */
  trimLines = false;

  /** Skip empty lines. */
  skipEmptyOrNull = false;

  /** Skip empty lines and lines made only of whitespace. */
  skipWhitespaceOnly = false;

  /** Skip lines shorter than this. `-1` disables the rule. */
  minLineLength = LENGTH_NOT_SET;

  /** Skip lines longer than this. `-1` disables the rule. */
  maxLineLength = LENGTH_NOT_SET;

  /** Skip lines containing any of these substrings. */
  readonly skipContaining: string[] = [];

  /** Skip lines starting with any of these prefixes. */
  readonly skipStartingWith: string[] = [];

  /** Skip lines ending with any of these suffixes. */
  readonly skipEndingWith: string[] = [];

  /**
   * Build a configuration from plain options, e.g. parsed from a JSON file.
   * @throws InvalidArgumentError when an option has the wrong shape
   */
  static fromOptions(options: ReaderOptions): ReaderConfiguration {
    const validationResult = readerOptionsSchema.safeParse(options);
    if (!validationResult.success) {
      const errors = validationResult.error.errors.map((e) =>
        e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
      );
      throw new InvalidArgumentError(`Invalid reader options: ${errors.join(', ')}`, 'options');
    }

    const validated = validationResult.data;
    const configuration = new ReaderConfiguration();

    configuration.trimLines = validated.trimLines ?? false;
    configuration.skipEmptyOrNull = validated.skipEmptyOrNull ?? false;
    configuration.skipWhitespaceOnly = validated.skipWhitespaceOnly ?? false;
    configuration.minLineLength = validated.minLineLength ?? LENGTH_NOT_SET;
    configuration.maxLineLength = validated.maxLineLength ?? LENGTH_NOT_SET;
    configuration.skipContaining.push(...(validated.skipContaining ?? []));
    configuration.skipStartingWith.push(...(validated.skipStartingWith ?? []));
    configuration.skipEndingWith.push(...(validated.skipEndingWith ?? []));

    return configuration;
  }

  toOptions(): ResolvedReaderOptions {
    return {
      trimLines: this.trimLines,
      skipEmptyOrNull: this.skipEmptyOrNull,
      skipWhitespaceOnly: this.skipWhitespaceOnly,
      minLineLength: this.minLineLength,
      maxLineLength: this.maxLineLength,
      skipContaining: [...this.skipContaining],
      skipStartingWith: [...this.skipStartingWith],
      skipEndingWith: [...this.skipEndingWith],
    };
  }
}
