import { LENGTH_NOT_SET, type ReaderConfiguration } from './reader.config.js';

export type SkipRule =
  | 'emptyOrNull'
  | 'whitespaceOnly'
  | 'minLineLength'
  | 'maxLineLength'
  | 'containing'
  | 'startingWith'
  | 'endingWith';

export interface LineFilterResult {
  passed: boolean;
  rule?: SkipRule;
}

// Unicode space separators plus the control whitespace. U+FEFF is not whitespace here.
const WHITESPACE = '[\\t\\n\\v\\f\\r\\u0085\\u2028\\u2029\\p{Zs}]';
const EDGE_WHITESPACE = new RegExp(`^${WHITESPACE}+|${WHITESPACE}+$`, 'gu');
const ONLY_WHITESPACE = new RegExp(`^${WHITESPACE}*$`, 'u');

export function trimLine(line: string): string {
  return line.replace(EDGE_WHITESPACE, '');
}

export function isWhitespaceOnly(line: string): boolean {
  return ONLY_WHITESPACE.test(line);
}

const PASSED: LineFilterResult = { passed: true };

function skippedBy(rule: SkipRule): LineFilterResult {
  return { passed: false, rule };
}

/**
 * Run a line through the configured rules in order and report the first one
 * that rejects it. Rules with an empty substring list never match.
 */
export function evaluateLine(line: string | null, config: ReaderConfiguration): LineFilterResult {
  if (line === null) {
    return PASSED;
  }

  if (config.skipEmptyOrNull && line.length === 0) {
    return skippedBy('emptyOrNull');
  }

  if (config.skipWhitespaceOnly && isWhitespaceOnly(line)) {
    return skippedBy('whitespaceOnly');
  }

  if (config.minLineLength !== LENGTH_NOT_SET && line.length < config.minLineLength) {
    return skippedBy('minLineLength');
  }

  if (config.maxLineLength !== LENGTH_NOT_SET && line.length > config.maxLineLength) {
    return skippedBy('maxLineLength');
  }

  if (config.skipContaining.some((pattern) => line.includes(pattern))) {
    return skippedBy('containing');
  }

  if (config.skipStartingWith.some((prefix) => line.startsWith(prefix))) {
    return skippedBy('startingWith');
  }

  if (config.skipEndingWith.some((suffix) => line.endsWith(suffix))) {
    return skippedBy('endingWith');
  }

  return PASSED;
}

export function shouldSkipLine(line: string | null, config: ReaderConfiguration): boolean {
  return !evaluateLine(line, config).passed;
}
