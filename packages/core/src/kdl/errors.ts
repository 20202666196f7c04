import {
  formatJsonPointer,
  type JsonPointer,
} from "../json-pointer/index.js";

export type ReservedKey = "_args" | "_props" | "_children";

export type KdlErrorDetail =
  | {
      type: "unsupportedLiteralType";
      path: string;
      valueType: string;
      value: string;
    }
  | {
      type: "unsupportedAttributeType";
      path: string;
      name: string;
      valueType: string;
      value: string;
    }
  | { type: "invalidReservedKey"; path: string; key: ReservedKey; reason: string }
  | { type: "cyclicStructure"; path: string }
  | { type: "invalidDocumentRoot"; valueType: string };

function describeDetail(detail: KdlErrorDetail): string {
  switch (detail.type) {
    case "unsupportedLiteralType":
      return `Cannot convert value of type ${detail.valueType} to KDL literal: ${detail.value}`;
    case "unsupportedAttributeType":
      return `Cannot convert type \`${detail.valueType}\` to KDL: ${detail.name} = ${detail.value}`;
    case "invalidReservedKey":
      return `Invalid ${detail.key}: ${detail.reason}`;
    case "cyclicStructure":
      return "Value contains itself";
    case "invalidDocumentRoot":
      return `Document root must be a mapping, got ${detail.valueType}`;
  }
}

/**
 * Human-readable one-line description of an error detail, with its location.
 */
export function formatKdlErrorDetail(detail: KdlErrorDetail): string {
  const message = describeDetail(detail);
  if (detail.type === "invalidDocumentRoot") return message;
  return `${message} (at ${detail.path === "" ? "/" : detail.path})`;
}

/**
 * Raised by the normaliser and the serializers. Every KdlError aborts the
 * whole render.
 */
export class KdlError extends Error {
  constructor(readonly detail: KdlErrorDetail) {
    super(formatKdlErrorDetail(detail));
    this.name = "KdlError";
  }
}

export function unsupportedLiteralType(
  path: JsonPointer,
  valueType: string,
  value: string
): KdlError {
  return new KdlError({
    type: "unsupportedLiteralType",
    path: formatJsonPointer(path),
    valueType,
    value,
  });
}

export function unsupportedAttributeType(
  path: JsonPointer,
  name: string,
  valueType: string,
  value: string
): KdlError {
  return new KdlError({
    type: "unsupportedAttributeType",
    path: formatJsonPointer(path),
    name,
    valueType,
    value,
  });
}

export function invalidReservedKey(
  path: JsonPointer,
  key: ReservedKey,
  reason: string
): KdlError {
  return new KdlError({
    type: "invalidReservedKey",
    path: formatJsonPointer(path),
    key,
    reason,
  });
}

export function cyclicStructure(path: JsonPointer): KdlError {
  return new KdlError({ type: "cyclicStructure", path: formatJsonPointer(path) });
}
