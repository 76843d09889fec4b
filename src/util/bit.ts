export const word = (high: number, low: number): number => ((high & 0xff) << 8) | (low & 0xff);
// Two's complement reinterpretation of a byte (JR / ADD SP,e operands)
export const signed8 = (n: number): number => ((n & 0xff) ^ 0x80) - 0x80;

export const hex2 = (v: number): string => (v & 0xff).toString(16).toUpperCase().padStart(2, '0');
export const hex4 = (v: number): string => (v & 0xffff).toString(16).toUpperCase().padStart(4, '0');
