import { tmpdir } from 'node:os';
import { z } from 'zod';

export interface AppConfig {
  /** Directory holding generated packages and uploaded media */
  outputFolder: string;
  port: number;
  /** Absolute base for download URLs; derived from each request when unset */
  publicBaseUrl: string | null;
  maxUploadBytes: number;
  /** Include the underlying failure text in 500 responses */
  exposeErrorDetails: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  OUTPUT_FOLDER: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  PUBLIC_BASE_URL: z
    .string()
    .url()
    .transform(url => url.replace(/\/+$/, ''))
    .optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  EXPOSE_ERROR_DETAILS: booleanFlag.default('true'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty variables as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    outputFolder: vars.OUTPUT_FOLDER ?? tmpdir(),
    port: vars.PORT,
    publicBaseUrl: vars.PUBLIC_BASE_URL ?? null,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    exposeErrorDetails: vars.EXPOSE_ERROR_DETAILS,
  };
}
