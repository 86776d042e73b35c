import type { StepResult } from "./types.js";

export class GeminiConfigError extends Error {
  constructor(message = "GEMINI_API_KEY not configured") {
    super(message);
    this.name = "GeminiConfigError";
  }
}

export class GeminiApiError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`Gemini API error ${status}: ${body}`);
    this.name = "GeminiApiError";
  }
}

export class GitHubApiError extends Error {
  constructor(message: string, readonly status: number, readonly body: string) {
    super(`${message}: ${status} ${body}`);
    this.name = "GitHubApiError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/** Runs one stage and folds a thrown error into a failed StepResult. */
export async function attempt<T>(fn: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}
