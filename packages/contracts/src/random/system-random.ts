import { webcrypto } from "node:crypto";

/**
 * Fresh unsigned 32-bit integer from the platform CSPRNG. Used to pick a
 * seed when the caller did not supply one; everything downstream of the
 * seed stays deterministic.
 */
export function randomUint32(): number {
  const buffer = new Uint32Array(1);
  webcrypto.getRandomValues(buffer);
  return (buffer[0] ?? 0) >>> 0;
}
