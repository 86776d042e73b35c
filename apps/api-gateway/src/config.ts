import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

const optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  GEMINI_API_KEY: optional,
  GEMINI_MODEL: z.string().default('gemini-1.5-pro'),
  GEMINI_API_BASE: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  GITHUB_TOKEN: optional,
  GITHUB_OWNER: optional,
  GITHUB_API_BASE: z.string().url().default('https://api.github.com'),
  GITHUB_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SUBMISSION_SECRET: optional,
  STUDENT_SECRET: optional,
  EVALUATION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export type AppConfig = Readonly<{
  port: number;
  gemini: Readonly<{ apiKey?: string; model: string; apiBase: string }>;
  github: Readonly<{ token?: string; owner?: string; apiBase: string; timeoutMs: number }>;
  submissionSecret?: string;
  evaluationTimeoutMs: number;
}>;

/** Built once at startup and handed to whatever needs it. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return Object.freeze({
    port: e.PORT,
    gemini: Object.freeze({ apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, apiBase: e.GEMINI_API_BASE }),
    github: Object.freeze({
      token: e.GITHUB_TOKEN,
      owner: e.GITHUB_OWNER,
      apiBase: e.GITHUB_API_BASE,
      timeoutMs: e.GITHUB_TIMEOUT_MS,
    }),
    submissionSecret: e.SUBMISSION_SECRET ?? e.STUDENT_SECRET,
    evaluationTimeoutMs: e.EVALUATION_TIMEOUT_MS,
  });
}

export function loadConfigFromDotenv(): AppConfig {
  loadEnv();
  return loadConfig(process.env);
}
