// Re-export public API
export type {
  KdlBool,
  KdlDocument,
  KdlEntry,
  KdlFloat,
  KdlInt,
  KdlMapping,
  KdlNull,
  KdlScalar,
  KdlSequence,
  KdlString,
  KdlValue,
  NodeBody,
  RenderOptions,
} from "./types.js";
export type { KdlErrorDetail, ReservedKey } from "./errors.js";
export { KdlError, formatKdlErrorDetail } from "./errors.js";
export { toKdlDocument, toKdlValue } from "./toKdlValue.js";
export { serializeLiteral as encodeLiteral } from "./serializeLiteral.js";
export { serializeDocument, renderKdl, tryRenderKdl } from "./serializeDocument.js";
