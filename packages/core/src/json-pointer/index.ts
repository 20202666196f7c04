export type JsonPointer = readonly string[];

/**
 * Encode a single JSON Pointer reference token per RFC 6901
 * ~ → ~0, / → ~1 (must encode in this order)
 */
function encodeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Append a reference token to a pointer. Array indices are written in
 * their decimal form.
 */
export function appendToken(
  pointer: JsonPointer,
  token: string | number
): JsonPointer {
  return [...pointer, String(token)];
}

/**
 * Format path segments as a JSON Pointer string per RFC 6901.
 * The empty pointer (whole document) formats as "".
 */
export function formatJsonPointer(pointer: JsonPointer): string {
  return pointer.map((token) => "/" + encodeToken(token)).join("");
}
