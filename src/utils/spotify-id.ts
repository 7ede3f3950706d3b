const BASE62_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const ID_LENGTH = 22;
const MAX_ID = (1n << 128n) - 1n;

/**
 * Decode a 22-character base62 id into its 32-character hex gid.
 * Returns null when the string is not a valid id or does not fit in 128 bits.
 */
export function base62ToHex(id: string): string | null {
  if (id.length !== ID_LENGTH) return null;

  let value = 0n;
  for (const char of id) {
    const digit = BASE62_ALPHABET.indexOf(char);
    if (digit === -1) return null;
    value = value * 62n + BigInt(digit);
  }

  if (value > MAX_ID) return null;
  return value.toString(16).padStart(32, '0');
}

/**
 * Encode a 32-character hex gid as a 22-character base62 id
 */
export function hexToBase62(gid: string): string {
  if (!/^[0-9a-fA-F]{32}$/.test(gid)) {
    throw new Error(`Invalid gid: ${gid}`);
  }

  let value = BigInt(`0x${gid}`);
  let result = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    result = BASE62_ALPHABET[Number(value % 62n)] + result;
    value /= 62n;
  }
  return result;
}

export function isCatalogId(id: string): boolean {
  return base62ToHex(id) !== null;
}
