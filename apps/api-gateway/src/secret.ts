// apps/api-gateway/src/secret.ts
import crypto from "crypto";

/**
 * Shared-secret check for task submissions. Both sides are trimmed before a
 * constant-time compare; with no configured secret everything passes.
 */
export function verifySubmissionSecret(body: Record<string, unknown>, secret: string | undefined): boolean {
  if (!secret) return true;

  const supplied = body.secret;
  if (supplied === undefined || supplied === null) return false;

  const a = Buffer.from(String(supplied).trim());
  const b = Buffer.from(secret.trim());
  if (a.length !== b.length) return false;

  return crypto.timingSafeEqual(a, b);
}
