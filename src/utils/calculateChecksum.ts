import crypto from "node:crypto";

export function calculateChecksum(content: string | Uint8Array): string {
    return crypto.createHash("sha256").update(content).digest("hex");
}
