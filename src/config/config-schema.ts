import { z } from 'zod';
import { LOG_LEVELS } from '../logging.js';
import { DEFAULT_FILLER_PHRASES } from '../description/resolver.js';

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const SpecReporterConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    verbose: z.boolean().default(false),
    color: z.boolean().default(true),
    includeEmptySuites: z.boolean().default(false),
    fillerPhrases: z
      .array(z.string().trim().min(1))
      .default([...DEFAULT_FILLER_PHRASES])
      .describe('Trailing "with ..." segments dropped from documentation lines'),
    // Identifier path ("DescribeCar > WithFullTank") to description
    overrides: z.record(z.string(), z.string().trim().min(1)).default({}),
    logLevel: LogLevelSchema.default('silent'),
  })
  .strict();

export type SpecReporterConfig = z.infer<typeof SpecReporterConfigSchema>;
