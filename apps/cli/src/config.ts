import { LOG_LEVELS, type LogLevel } from '@invoice-audit/logger';

import { CHAT_COMPLETION_API, CREDENTIAL_BROKER } from '@invoice-audit/shared';
import { z } from 'zod';

export const DEFAULT_PDF_FILE = 'счет-фактура.pdf';

/**
 * Runtime configuration of the CLI
 */
export interface AppConfig {
  authKey: string;
  scope: string;
  authUrl: string;
  apiUrl: string;
  model: string;
  /** Tesseract languages, primary first */
  ocrLanguages: string[];
  logLevel: LogLevel;
  /** Input document used when no path is given on the command line */
  pdfFile: string;
}

/**
 * Configuration could not be read from the environment
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  GIGACHAT_AUTH_KEY: z.string(),
  GIGACHAT_SCOPE: z.string().default(CREDENTIAL_BROKER.DEFAULT_SCOPE),
  GIGACHAT_AUTH_URL: z.string().url().default(CREDENTIAL_BROKER.DEFAULT_AUTH_URL),
  GIGACHAT_API_URL: z.string().url().default(CHAT_COMPLETION_API.DEFAULT_API_URL),
  GIGACHAT_MODEL: z.string().default(CHAT_COMPLETION_API.DEFAULT_MODEL),
  OCR_LANGUAGES: z
    .string()
    .default('rus+eng')
    .transform((value) =>
      value
        .split(/[+,]/)
        .map((language) => language.trim())
        .filter(Boolean),
    )
    .refine((languages) => languages.length > 0, {
      message: 'must name at least one language',
    }),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PDF_FILE: z.string().default(DEFAULT_PDF_FILE),
});

/**
 * Read configuration from environment variables.
 * Blank variables count as unset.
 *
 * @throws {ConfigError} listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim() !== '',
    ),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const parsed = result.data;
  return {
    authKey: parsed.GIGACHAT_AUTH_KEY,
    scope: parsed.GIGACHAT_SCOPE,
    authUrl: parsed.GIGACHAT_AUTH_URL,
    apiUrl: parsed.GIGACHAT_API_URL,
    model: parsed.GIGACHAT_MODEL,
    ocrLanguages: parsed.OCR_LANGUAGES,
    logLevel: parsed.LOG_LEVEL,
    pdfFile: parsed.PDF_FILE,
  };
}
