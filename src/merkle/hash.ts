import crypto from "node:crypto";

/** Root reported for a tree without leaves. */
export const EMPTY_ROOT = "0".repeat(64);

const SHA256_PATTERN = /^[0-9a-fA-F]{64}$/;

export function sha256Hex(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

export function isSha256Hex(value: unknown): value is string {
  return typeof value === "string" && SHA256_PATTERN.test(value);
}

export function normalizeRuleContent(content: string): string {
  return content.trim().replace(/\r\n/g, "\n");
}

/**
 * Leaf hash of a single rule: SHA-256 over `<ruleId>::<normalized content>`.
 */
export function computeRuleHash(ruleId: string, content: string): string {
  return sha256Hex(`${ruleId}::${normalizeRuleContent(content)}`);
}
