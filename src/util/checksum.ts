// FNV-1a over the big-endian bytes of each word
export const fnv1a32 = (words: ArrayLike<number>): number => {
  let hash = 0x811c9dc5 >>> 0; // offset basis
  for (let i = 0; i < words.length; i++) {
    const w = (words[i] ?? 0) & 0xffff;
    hash ^= w >>> 8;
    // FNV prime 16777619
    hash = Math.imul(hash, 0x01000193) >>> 0;
    hash ^= w & 0xff;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
};
