import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";

export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

// Both tokens are hashed under one key so the comparison sees equal-length digests.
const COMPARE_KEY = randomBytes(32);

function digest(value: string): Buffer {
  return createHmac("sha256", COMPARE_KEY).update(value).digest();
}

/**
 * Check the X-Telegram-Bot-Api-Secret-Token header against the configured secret.
 * With no secret configured every request passes.
 */
export function verifyWebhookSecret(secret: string | null, headerToken: string | undefined): boolean {
  if (!secret) return true;
  if (!headerToken) return false;
  return timingSafeEqual(digest(secret), digest(headerToken));
}
