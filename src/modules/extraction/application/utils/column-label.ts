const ALPHABET_SIZE = 26;
const CODE_A = 'A'.charCodeAt(0);

/**
 * Spreadsheet column label for a 1-based index: 1 → A, 26 → Z, 27 → AA, 702 → ZZ.
 * Bijective base 26, so there is no zero digit.
 */
export function columnLabel(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Column index must be a positive integer, got ${index}`);
  }

  let label = '';
  let n = index;
  while (n > 0) {
    const remainder = (n - 1) % ALPHABET_SIZE;
    label = String.fromCharCode(CODE_A + remainder) + label;
    n = Math.floor((n - 1) / ALPHABET_SIZE);
  }
  return label;
}

export function columnIndex(label: string): number {
  const normalized = label.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new RangeError(`Invalid column label: "${label}"`);
  }

  let index = 0;
  for (const char of normalized) {
    index = index * ALPHABET_SIZE + (char.charCodeAt(0) - CODE_A + 1);
  }
  return index;
}

/** Accepts a 1-based number or a column label such as "C". */
export function parseColumnRef(ref: string): number {
  const trimmed = ref.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : columnIndex(trimmed);
}
