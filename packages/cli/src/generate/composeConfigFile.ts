import { tryRenderKdl, type KdlErrorDetail } from "@kdlgen/core/kdl";
import { andThen, ok, type Result } from "@kdlgen/core/result";

/**
 * Full text of the generated file: the rendered settings, then a newline,
 * then the extra lines verbatim.
 */
export function composeConfigFile(
  settings: unknown,
  extraConfig: string
): Result<string, KdlErrorDetail> {
  const appendExtra = andThen((kdl: string) =>
    ok<string, KdlErrorDetail>(kdl + "\n" + extraConfig)
  );
  // The loader reads YAML integers as bigint, so plain numbers are floats
  return appendExtra(tryRenderKdl(settings, { floatNumbers: true }));
}
