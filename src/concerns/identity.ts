import { randomFillSync } from 'crypto';

export type IdentityGenerator = () => string;

const NON_NEGATIVE_MASK = 0x7fffffffffffffffn;

/** Random non-negative 63-bit integer in decimal, e.g. `"4611686018427387904"`. */
export function randomIdentity(): string {
  const bytes = randomFillSync(Buffer.alloc(8));
  return (bytes.readBigUInt64BE(0) & NON_NEGATIVE_MASK).toString();
}

export function encodeIdentity(id: string): Uint8Array {
  return Buffer.from(id, 'utf8');
}

export function decodeIdentity(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf8');
}

/** Byte-for-byte equality of two encoded identities. */
export function sameIdentity(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.compare(a, b) === 0;
}
