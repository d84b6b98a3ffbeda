import crypto from "node:crypto"

/** "sha256=<hex>" HMAC of the raw body, as GitHub sends it */
export function signPayload(secret: string, payload: string): string {
  return `sha256=${crypto.createHmac("sha256", secret).update(payload).digest("hex")}`
}

/**
 * Verify a GitHub webhook signature
 * https://docs.github.com/en/webhooks/using-webhooks/validating-webhook-deliveries
 */
export function verifySignature(secret: string, payload: string, signature: string): boolean {
  const expected = Buffer.from(signPayload(secret, payload))
  const received = Buffer.from(signature)
  // timingSafeEqual throws on length mismatch
  if (expected.length !== received.length) {
    return false
  }
  return crypto.timingSafeEqual(expected, received)
}
