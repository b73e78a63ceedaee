export const u16 = (n: number): number => (n & 0xffff) >>> 0;

export const hex2 = (v: number): string => (v & 0xff).toString(16).toUpperCase().padStart(2, '0');
export const hex4 = (v: number): string => (v & 0xffff).toString(16).toUpperCase().padStart(4, '0');

export const sext8 = (n: number): number => {
  const b = n & 0xff;
  return b & 0x80 ? b - 0x100 : b;
};
export const sext16 = (n: number): number => {
  const w = n & 0xffff;
  return w & 0x8000 ? w - 0x10000 : w;
};

// ACC:EXT as one unsigned 32-bit value
export const joinWords = (high: number, low: number): number => (((high & 0xffff) << 16) | (low & 0xffff)) >>> 0;
export const splitWords = (n: number): [number, number] => [(n >>> 16) & 0xffff, n & 0xffff];
