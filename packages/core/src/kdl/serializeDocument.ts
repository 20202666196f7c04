import { tryCatch, type Result } from "../result/result.js";
import { KdlError, type KdlErrorDetail } from "./errors.js";
import { Printer } from "./Printer.js";
import { serializeAttribute } from "./serializeAttribute.js";
import { toKdlDocument } from "./toKdlValue.js";
import type { KdlDocument, RenderOptions } from "./types.js";

/**
 * Serialize a typed document: every root entry in order, one block each,
 * followed by a trailing newline. An empty document is "\n".
 */
export function serializeDocument(document: KdlDocument): string {
  const printer = new Printer();
  for (const [name, value] of document.entries) {
    serializeAttribute(name, value, { printer, path: [name] });
  }
  return printer.toString() + "\n";
}

/**
 * Render a host mapping (plain object or Map, arbitrarily nested) as KDL.
 * Throws a {@link KdlError} when part of the value has no KDL encoding.
 */
export function renderKdl(settings: unknown, options?: RenderOptions): string {
  return serializeDocument(toKdlDocument(settings, options));
}

/**
 * Same as {@link renderKdl}, reporting conversion failures as a Result.
 */
export function tryRenderKdl(
  settings: unknown,
  options?: RenderOptions
): Result<string, KdlErrorDetail> {
  return tryCatch(
    () => renderKdl(settings, options),
    (error) => (error instanceof KdlError ? error.detail : undefined)
  );
}
