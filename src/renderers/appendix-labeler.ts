/**
 * appendix-labeler.ts
 * Alphabetic appendix numbering: 1 → A, 26 → Z, 27 → AA, 1000 → ALL.
 */

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Convert a positive integer into a bijective base-`base` numeral written
 * with the letters A..Z (there is no zero digit).
 */
export function appendixLabel(n: number, base = 26): string {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Appendix number must be a positive integer, got ${n}`);
  }
  if (!Number.isInteger(base) || base < 2 || base > LETTERS.length) {
    throw new RangeError(`Alphabet size must be an integer in 2..${LETTERS.length}, got ${base}`);
  }

  let label = '';
  let rest = n;
  while (rest > 0) {
    const digit = (rest - 1) % base;
    label = LETTERS.charAt(digit) + label;
    rest = Math.floor((rest - 1) / base);
  }
  return label;
}

/** `Appendix <label>` title line. */
export function appendixTitle(n: number): string {
  return `Appendix ${appendixLabel(n)}`;
}
