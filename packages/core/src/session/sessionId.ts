import { randomBytes } from "node:crypto";
import { base32 } from "rfc4648";

const SESSION_ID_BYTES = 32;

/**
 * 32 CSPRNG bytes as unpadded upper-case base32 (52 characters).
 */
export function generateSessionId(): string {
    return base32.stringify(randomBytes(SESSION_ID_BYTES), { pad: false });
}
