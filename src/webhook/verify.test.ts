import { describe, expect, test } from "vitest";
import { createHmac } from "node:crypto";
import { verifyWebhookSignature } from "./verify.ts";

const SECRET = "test-secret";
const BODY = JSON.stringify({ action: "opened", number: 1 });

function sign(body: string, secret = SECRET): string {
  return `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`;
}

describe("verifyWebhookSignature", () => {
  test("accepts a valid sha256 signature", async () => {
    expect(await verifyWebhookSignature(SECRET, BODY, sign(BODY))).toBe(true);
  });

  test("rejects a signature made with another secret", async () => {
    expect(await verifyWebhookSignature(SECRET, BODY, sign(BODY, "other-secret"))).toBe(false);
  });

  test("rejects a signature for a different body", async () => {
    expect(await verifyWebhookSignature(SECRET, `${BODY} `, sign(BODY))).toBe(false);
  });

  test("rejects missing, malformed and sha1 signatures", async () => {
    expect(await verifyWebhookSignature(SECRET, BODY, undefined)).toBe(false);
    expect(await verifyWebhookSignature(SECRET, BODY, "")).toBe(false);
    expect(await verifyWebhookSignature(SECRET, BODY, "sha256=zz")).toBe(false);
    expect(
      await verifyWebhookSignature(SECRET, BODY, `sha1=${createHmac("sha1", SECRET).update(BODY).digest("hex")}`),
    ).toBe(false);
  });

  test("rejects everything without a secret", async () => {
    expect(await verifyWebhookSignature("", BODY, sign(BODY, ""))).toBe(false);
  });
});
