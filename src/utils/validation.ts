const STD_ALPHABET = /^[A-Za-z0-9+/]+={0,2}$/;
const URL_ALPHABET = /^[A-Za-z0-9_-]+={0,2}$/;

function hasValidPadding(input: string): boolean {
  if (input.includes('=')) return input.length % 4 === 0;
  // unpadded: a single trailing character can never encode a whole byte
  return input.length % 4 !== 1;
}

export function isBase64(input: string): boolean {
  if (input.length === 0) return false;
  if (!STD_ALPHABET.test(input) || !hasValidPadding(input)) return false;
  const buf = Buffer.from(input, 'base64');
  // Ensure decoding round-trips (Buffer silently drops stray bits)
  return buf.length > 0 && buf.toString('base64').replace(/=+$/, '') === input.replace(/=+$/, '');
}

export function isBase64Url(input: string): boolean {
  if (input.length === 0) return false;
  if (!URL_ALPHABET.test(input) || !hasValidPadding(input)) return false;
  const buf = Buffer.from(input, 'base64url');
  return buf.length > 0 && buf.toString('base64url') === input.replace(/=+$/, '');
}

/**
 * Decodes standard or URL-safe base64, padded or not. Returns null for
 * anything else, including strings that mix both alphabets.
 */
export function decodeBase64(input: string): Buffer | null {
  if (isBase64(input)) return Buffer.from(input, 'base64');
  if (isBase64Url(input)) return Buffer.from(input, 'base64url');
  return null;
}
