// FNV-1a 32-bit over the UTF-8 bytes of a listing. Used to print a short
// fingerprint of the canonical output so two builds can be compared without
// keeping both listings around.
export function fnv1a32(bytes: ArrayLike<number>): number {
  let hash = 0x811c9dc5 >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash >>> 0, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

export function fingerprint(text: string): string {
  const h = fnv1a32(new TextEncoder().encode(text));
  return h.toString(16).padStart(8, '0');
}
