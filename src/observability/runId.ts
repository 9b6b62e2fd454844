import crypto from "node:crypto";

export function createRunId(now = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  return `harvest_${stamp}_${crypto.randomBytes(3).toString("hex")}`;
}
