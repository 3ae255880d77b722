// ---------------------------------------------------------------------------
// ISBN normalisation for catalog titles.
// ---------------------------------------------------------------------------

/** Strip hyphens and whitespace, uppercase a trailing "x". */
function stripFormatting(raw: string): string {
  return raw.replace(/[\s-]/g, "").toUpperCase();
}

function isbn10CheckDigit(first9: string): string {
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9[i]);
  }
  const remainder = (11 - (sum % 11)) % 11;
  return remainder === 10 ? "X" : String(remainder);
}

function isbn13CheckDigit(first12: string): string {
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(first12[i]);
  }
  return String((10 - (sum % 10)) % 10);
}

/**
 * Normalise an ISBN-10 or ISBN-13 to its bare form (digits, plus a possible
 * trailing "X" for ISBN-10). Returns `null` when the length or check digit
 * is wrong.
 */
export function normalizeISBN(raw: string): string | null {
  const isbn = stripFormatting(raw);

  if (/^\d{9}[\dX]$/.test(isbn)) {
    return isbn10CheckDigit(isbn.slice(0, 9)) === isbn[9] ? isbn : null;
  }

  if (/^97[89]\d{10}$/.test(isbn)) {
    return isbn13CheckDigit(isbn.slice(0, 12)) === isbn[12] ? isbn : null;
  }

  return null;
}
