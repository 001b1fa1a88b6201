/**
 * Composite entity identifiers.
 *
 * The same raw record key may be loaded under several types, so the id exposed
 * to callers binds the key to the record's primary (first listed) type:
 * `person:q42`. Decoding splits on the first separator only, so raw keys may
 * themselves contain ':'.
 */

export const ID_SEPARATOR = ":";

export function composeEntityId(primaryType: string, rawKey: string): string {
  if (primaryType.includes(ID_SEPARATOR)) {
    throw new Error(`Type id '${primaryType}' must not contain '${ID_SEPARATOR}'`);
  }
  if (primaryType === "") return rawKey;
  return primaryType + ID_SEPARATOR + rawKey;
}

export function rawKeyOf(id: string): string {
  const at = id.indexOf(ID_SEPARATOR);
  return at < 0 ? id : id.slice(at + 1);
}

export function primaryTypeOf(id: string): string {
  const at = id.indexOf(ID_SEPARATOR);
  return at < 0 ? "" : id.slice(0, at);
}
