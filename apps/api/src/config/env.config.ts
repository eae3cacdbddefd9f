import { z } from 'zod';
import { INGESTION_DEFAULTS, REPORT_LIMITS } from '@tabula/shared';

const envSchema = z.object({
  PORT: z.coerce.number().int().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  REPORT_OUTPUT_DIR: z.string().min(1).default('.'),
  CSV_DELIMITER: z.string().length(1).default(INGESTION_DEFAULTS.CSV_DELIMITER),
  PDF_PAGE_SIZE: z.enum(['A4', 'LETTER']).default('A4'),
  PDF_MARGIN: z.coerce.number().int().min(0).max(200).default(50),
  MAX_REPORT_SECTIONS: z.coerce.number().int().min(1).max(REPORT_LIMITS.MAX_SECTIONS).default(REPORT_LIMITS.MAX_SECTIONS),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
