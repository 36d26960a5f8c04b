import crypto from "node:crypto";

/** Short, stable fingerprint for log lines that must not carry the caption itself. */
export function textFingerprint(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex").slice(0, 12);
}
