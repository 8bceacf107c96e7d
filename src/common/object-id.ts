const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/** True when `value` is the 24-hex-character form of a store identifier. */
export function isObjectId(value: string): boolean {
  return OBJECT_ID_PATTERN.test(value);
}
