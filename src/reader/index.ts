export { FilteringReader, LINE_TERMINATOR, withFilteringReader } from './filtering-reader.js';
export {
  evaluateLine,
  isWhitespaceOnly,
  shouldSkipLine,
  trimLine,
  type LineFilterResult,
  type SkipRule,
} from './line-filter.js';
export {
  ArrayLineSource,
  FileLineSource,
  StringLineSource,
  type FileLineSourceOptions,
  type LineSource,
} from './line-source.js';
export { LENGTH_NOT_SET, ReaderConfiguration } from './reader.config.js';
export { InvalidArgumentError, ReaderClosedError } from './reader.errors.js';
