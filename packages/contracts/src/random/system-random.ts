import { randomInt } from "node:crypto";

/**
 * Unsigned 32-bit integer from the system CSPRNG, used as the seed when a
 * config leaves `seed` out.
 */
export function randomUint32(): number {
  return randomInt(0x100000000);
}
