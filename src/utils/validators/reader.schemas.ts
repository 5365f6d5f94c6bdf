import { z } from 'zod';

const lineLengthSchema = z
  .number()
  .int('Line length must be an integer')
  .min(-1, 'Line length must be -1 (disabled) or a non-negative integer');

const substringListSchema = z.array(z.string({ invalid_type_error: 'Skip rules must be strings' }));

/**
 * Schema for validating plain reader configuration options
 */
export const readerOptionsSchema = z
  .object({
    trimLines: z.boolean(),
    skipEmptyOrNull: z.boolean(),
    skipWhitespaceOnly: z.boolean(),
    minLineLength: lineLengthSchema,
    maxLineLength: lineLengthSchema,
    skipContaining: substringListSchema,
    skipStartingWith: substringListSchema,
    skipEndingWith: substringListSchema,
  })
  .partial()
  .strict();

/**
 * Schema for validating the character count passed to bulk reads
 */
export const charCountSchema = z
  .number()
  .int('Character count must be an integer')
  .nonnegative('Character count cannot be negative');

/**
 * Type exports for the schemas
 */
export type ReaderOptions = z.infer<typeof readerOptionsSchema>;
export type ResolvedReaderOptions = Required<ReaderOptions>;
