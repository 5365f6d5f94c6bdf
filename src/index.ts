export * from './reader/index.js';
export type { ReaderOptions, ResolvedReaderOptions } from './utils/validators/reader.schemas.js';
export {
  ConfigurationError,
  loadConfig,
  loadConfigWithDefaults,
  readerEncodings,
  type Config,
  type ReaderEncoding,
} from './config/config.service.js';
export { Logger, logger, type LogLevel } from './utils/logger/logger.service.js';
