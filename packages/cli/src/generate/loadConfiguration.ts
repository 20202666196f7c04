import { parseDocument } from "yaml";
import { z } from "zod";
import { GeneratorConfiguration } from "@kdlgen/core/configuration";
import { ok, err, type Result } from "@kdlgen/core/result";
import type { VFS } from "../vfs/VFS.js";
import type { GenerateError } from "./types.js";

/**
 * Parse configuration text (YAML, or JSON as a YAML subset).
 * Mappings are kept as Maps so that key order survives, including
 * integer-like keys that a plain object would reorder. Integers are read as
 * bigint, which keeps them exact and apart from floats such as `1.0`.
 */
export function parseConfiguration(
  text: string,
  path: string
): Result<GeneratorConfiguration, GenerateError> {
  const doc = parseDocument(text, { intAsBigInt: true });
  if (doc.errors.length > 0) {
    return err({
      type: "config",
      path,
      message: doc.errors.map((error) => error.message).join("\n"),
    });
  }

  const data: unknown = doc.toJS({ mapAsMap: true });
  // An empty file is an empty configuration
  const raw =
    data instanceof Map ? Object.fromEntries(data) : data ?? {};

  const parsed = GeneratorConfiguration.safeParse(raw);
  if (!parsed.success) {
    return err({ type: "config", path, message: z.prettifyError(parsed.error) });
  }
  return ok(parsed.data);
}

export async function loadConfiguration(
  vfs: VFS,
  path: string
): Promise<Result<GeneratorConfiguration, GenerateError>> {
  const text = await vfs.readFile(path);
  if (!text.success) {
    return err({ type: "io", error: text.error });
  }
  return parseConfiguration(text.data, path);
}
