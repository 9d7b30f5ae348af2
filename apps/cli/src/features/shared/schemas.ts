import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const REPORT_FORMATS = ['csv', 'json'] as const;

/**
 * Process command options (the positional file argument is validated separately)
 */
export const ProcessCommandOptionsSchema = z
  .object({
    format: z.enum(REPORT_FORMATS, { message: '--format must be one of: csv, json' }).optional().default('csv'),
    output: z.string().min(1, '--output must not be empty').optional(),
    skipInvalid: z.boolean().optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);
