/**
 * Zod schemas for validating conversion options coming from
 * configuration files or other untrusted input
 */

import { z } from 'zod';

/** Extension including the leading dot, e.g. ".csv" */
export const fileExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, 'Extension must start with "." and contain no path separators');

/** Options accepted by convertDocument */
export const convertOptionsSchema = z
  .object({
    /** Reject documents larger than this many UTF-8 bytes */
    maxInputBytes: z.number().int().min(1).optional(),
  })
  .strict();

/** Options accepted by the file and directory converters */
export const fileConversionOptionsSchema = convertOptionsSchema
  .extend({
    encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']).optional(),
    outputExtension: fileExtensionSchema.optional(),
    /** Only convert files with one of these extensions */
    extensions: z.array(fileExtensionSchema).min(1).optional(),
  })
  .strict();

export type ConvertOptionsInput = z.infer<typeof convertOptionsSchema>;
export type FileConversionOptionsInput = z.infer<typeof fileConversionOptionsSchema>;
