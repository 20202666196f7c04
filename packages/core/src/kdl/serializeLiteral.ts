import type { JsonPointer } from "../json-pointer/index.js";
import { unsupportedLiteralType } from "./errors.js";
import type { KdlValue } from "./types.js";
import { previewKdlValue } from "./utils.js";

// Only newlines and double quotes are escaped
function escapeString(value: string): string {
  return value.replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

// Whole floats keep a fractional part so they still read as decimals
function formatFloat(value: number): string {
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/**
 * Serialize a scalar value as a KDL literal.
 * Mappings, sequences and non-finite numbers have no literal form.
 */
export function serializeLiteral(
  value: KdlValue,
  path: JsonPointer = []
): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "float":
      if (!Number.isFinite(value.value)) {
        throw unsupportedLiteralType(path, "float", String(value.value));
      }
      return formatFloat(value.value);
    case "string":
      return `"${escapeString(value.value)}"`;
    case "mapping":
    case "sequence":
      throw unsupportedLiteralType(path, value.kind, previewKdlValue(value));
  }
}
