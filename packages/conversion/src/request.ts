/**
 * Conversion Request
 * 
 * The explicit, immutable input to one conversion. Everything the engine
 * needs to decide comes from here; nothing is read from presentation state.
 */

import { z } from 'zod';
import { InvalidRequestError } from '@mediaconv/core';
import { TARGET_FORMATS } from './formats.js';
import { QUALITY_LEVELS } from './presets.js';

export const conversionRequestSchema = z.object({
  sourcePath: z.string().min(1, 'sourcePath is required'),
  /** MIME type reported by whoever picked the file, when known */
  declaredContentType: z.string().min(1).optional(),
  target: z.enum(TARGET_FORMATS),
  compress: z.boolean().default(false),
  /** Only consulted when compress is true */
  qualityLevel: z.enum(QUALITY_LEVELS).default('high'),
});

export type ConversionRequest = Readonly<z.output<typeof conversionRequestSchema>>;
export type ConversionRequestInput = z.input<typeof conversionRequestSchema>;

/**
 * Validate and freeze a request
 * Throws InvalidRequestError describing the first problem found
 */
export function parseConversionRequest(input: unknown): ConversionRequest {
  const result = conversionRequestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'request';
    throw new InvalidRequestError(
      `Invalid conversion request (${field}): ${issue?.message ?? 'malformed'}`,
      { issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) }
    );
  }
  return Object.freeze(result.data);
}
