import type { KdlErrorDetail } from "@kdlgen/core/kdl";
import type { VFSError } from "../vfs/VFS.js";

export type GenerateMode = "write" | "check" | "stdout";

export interface GenerateOptions {
  configPath: string;
  mode?: GenerateMode; // Default: "write"
}

export type GenerateOutcome =
  | { status: "written"; path: string }
  | { status: "unchanged"; path: string }
  | { status: "upToDate"; path: string }
  | { status: "outdated"; path: string }
  | { status: "printed"; content: string };

export type GenerateError =
  | { type: "config"; path: string; message: string }
  | { type: "io"; error: VFSError }
  | { type: "render"; path: string; error: KdlErrorDetail };
