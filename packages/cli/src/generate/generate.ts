import * as path from "node:path";
import { formatKdlErrorDetail } from "@kdlgen/core/kdl";
import { ok, err, type Result } from "@kdlgen/core/result";
import type { VFS, VFSError } from "../vfs/VFS.js";
import { composeConfigFile } from "./composeConfigFile.js";
import { loadConfiguration } from "./loadConfiguration.js";
import type {
  GenerateError,
  GenerateOptions,
  GenerateOutcome,
} from "./types.js";

/**
 * Render the settings of a configuration file and bring its output file
 * up to date. The output path is resolved against the configuration
 * file's directory.
 */
export async function generate(
  vfs: VFS,
  options: GenerateOptions
): Promise<Result<GenerateOutcome, GenerateError>> {
  const { configPath, mode = "write" } = options;

  const config = await loadConfiguration(vfs, configPath);
  if (!config.success) return config;

  const { output, settings, extraConfig } = config.data;
  const content = composeConfigFile(settings, extraConfig);
  if (!content.success) {
    return err({ type: "render", path: configPath, error: content.error });
  }

  if (mode === "stdout") {
    return ok({ status: "printed", content: content.data });
  }

  const outputPath = path.resolve(path.dirname(configPath), output);
  const existing = await vfs.readFile(outputPath);
  if (!existing.success && existing.error.type !== "notFound") {
    return err({ type: "io", error: existing.error });
  }
  const isUpToDate = existing.success && existing.data === content.data;

  if (mode === "check") {
    return ok({
      status: isUpToDate ? "upToDate" : "outdated",
      path: outputPath,
    });
  }

  if (isUpToDate) {
    return ok({ status: "unchanged", path: outputPath });
  }
  const written = await vfs.writeFile(outputPath, content.data);
  if (!written.success) {
    return err({ type: "io", error: written.error });
  }
  return ok({ status: "written", path: outputPath });
}

function formatVFSError(error: VFSError): string {
  switch (error.type) {
    case "notFound":
      return `File not found: ${error.path}`;
    case "permissionDenied":
      return `Permission denied: ${error.path}`;
    case "unknown":
      return `Cannot access ${error.path}: ${error.message}`;
  }
}

export function formatGenerateError(error: GenerateError): string {
  switch (error.type) {
    case "config":
      return `Invalid configuration in ${error.path}:\n${error.message}`;
    case "io":
      return formatVFSError(error.error);
    case "render":
      return `Cannot render settings of ${error.path}: ${formatKdlErrorDetail(error.error)}`;
  }
}
