import { createHash } from 'node:crypto';

/** Alphabet of Anki's base91 note GUIDs */
const BASE91_TABLE =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!#$%&()*+,-./:;<=>?@[]^_`{|}~';

export function base91(value: bigint): string {
  if (value === 0n) {
    return BASE91_TABLE[0];
  }
  let rest = value;
  let out = '';
  while (rest > 0n) {
    out = BASE91_TABLE[Number(rest % 91n)] + out;
    rest /= 91n;
  }
  return out;
}

/**
 * Content-derived note GUID: the first 8 bytes of SHA-256 over the field
 * values joined by "__", read big-endian and base91-encoded.
 * The same values always give the same GUID, so re-importing a package
 * updates existing notes instead of duplicating them.
 */
export function guidFor(...values: string[]): string {
  const digest = createHash('sha256').update(values.join('__'), 'utf8').digest();
  return base91(digest.readBigUInt64BE(0));
}
