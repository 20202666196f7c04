import type { KdlScalar, KdlValue } from "./types.js";

// Type guard for the scalar variants of the value union
export function isScalar(value: KdlValue): value is KdlScalar {
  return value.kind !== "mapping" && value.kind !== "sequence";
}

/**
 * A sequence is flat when none of its elements is a mapping or a sequence.
 * The empty sequence is flat.
 */
export function isFlatSequence(
  items: readonly KdlValue[]
): items is readonly KdlScalar[] {
  return items.every(isScalar);
}

// Plain object literal or Object.create(null), not a class instance
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Name of a host value's runtime type, for error messages
export function describeHostType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Map) return "map";
  if (typeof value !== "object") return typeof value;
  if (isPlainObject(value)) return "object";

  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === "object" &&
    proto !== null &&
    "constructor" in proto &&
    typeof proto.constructor === "function" &&
    proto.constructor.name
  ) {
    return proto.constructor.name;
  }
  return "object";
}

// Short textual form of a host value, for error messages
export function previewHostValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "function":
      return value.name ? `[function ${value.name}]` : "[function]";
    case "symbol":
      return value.toString();
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return "[ ... ]";
      return Object.prototype.toString.call(value);
    default:
      return String(value);
  }
}

export function previewKdlValue(value: KdlValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "string":
      return JSON.stringify(value.value);
    case "mapping":
      return "{ ... }";
    case "sequence":
      return "[ ... ]";
    default:
      return String(value.value);
  }
}
