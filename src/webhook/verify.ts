import { verify } from "@octokit/webhooks-methods";

const SIGNATURE_PREFIX = "sha256=";

/**
 * Verify a GitHub webhook signature (X-Hub-Signature-256) using HMAC-SHA256.
 * Wraps @octokit/webhooks-methods, which does the timing-safe comparison.
 * Missing, non-sha256 and unverifiable signatures all return false.
 */
export async function verifyWebhookSignature(
  secret: string,
  payload: string,
  signature: string | undefined,
): Promise<boolean> {
  if (!secret || !signature || !signature.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  try {
    return await verify(secret, payload, signature);
  } catch {
    return false;
  }
}
