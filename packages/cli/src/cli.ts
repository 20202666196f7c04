import { ok, err, type Result } from "@kdlgen/core/result";
import { NodeVFS } from "./vfs/NodeVFS.js";
import type { VFS } from "./vfs/VFS.js";
import { generate, formatGenerateError } from "./generate/generate.js";
import type { GenerateMode } from "./generate/types.js";

export const VERSION = "0.1.0";

export const DEFAULT_CONFIG_PATH = "kdlgen.yaml";

export const USAGE = `Usage: kdlgen [options]

Render the settings of a configuration file to KDL and write the result.

Options:
  -c, --config <path>  Configuration file (default: ${DEFAULT_CONFIG_PATH})
      --check          Exit with status 1 when the output file is out of date
      --stdout         Print the generated text instead of writing it
  -h, --help           Show this help
  -v, --version        Show the version`;

export type ParsedArgs =
  | { command: "help" }
  | { command: "version" }
  | { command: "generate"; configPath: string; mode: GenerateMode };

/**
 * Parse command line arguments (without the node and script paths)
 */
export function parseArgs(args: readonly string[]): Result<ParsedArgs, string> {
  let configPath = DEFAULT_CONFIG_PATH;
  let mode: GenerateMode = "write";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-h":
      case "--help":
        return ok({ command: "help" });
      case "-v":
      case "--version":
        return ok({ command: "version" });
      case "-c":
      case "--config": {
        const value = args[i + 1];
        if (value === undefined || value.startsWith("-")) {
          return err(`${arg} requires a path`);
        }
        configPath = value;
        i++;
        break;
      }
      case "--check":
      case "--stdout": {
        const requested: GenerateMode = arg === "--check" ? "check" : "stdout";
        if (mode !== "write" && mode !== requested) {
          return err("--check and --stdout cannot be combined");
        }
        mode = requested;
        break;
      }
      default:
        return err(`Unknown argument: ${arg}`);
    }
  }

  return ok({ command: "generate", configPath, mode });
}

export interface CliIO {
  vfs: VFS;
  stdout: (text: string) => void;
}

const defaultIO: CliIO = {
  vfs: new NodeVFS(),
  stdout: (text) => process.stdout.write(text),
};

/**
 * Run the CLI and return its exit code:
 * 0 on success, 1 on failure or an outdated file under --check, 2 on usage errors.
 */
export async function run(
  args: readonly string[],
  io: CliIO = defaultIO
): Promise<number> {
  const parsed = parseArgs(args);
  if (!parsed.success) {
    console.error(parsed.error);
    console.error(USAGE);
    return 2;
  }

  const command = parsed.data;
  switch (command.command) {
    case "help":
      console.info(USAGE);
      return 0;
    case "version":
      console.info(VERSION);
      return 0;
    case "generate":
      break;
  }

  const result = await generate(io.vfs, {
    configPath: command.configPath,
    mode: command.mode,
  });
  if (!result.success) {
    console.error(formatGenerateError(result.error));
    return 1;
  }

  const outcome = result.data;
  switch (outcome.status) {
    case "printed":
      io.stdout(outcome.content);
      return 0;
    case "written":
      console.info(`Wrote ${outcome.path}`);
      return 0;
    case "unchanged":
      console.info(`${outcome.path} is up to date`);
      return 0;
    case "upToDate":
      console.info(`${outcome.path} is up to date`);
      return 0;
    case "outdated":
      console.error(`${outcome.path} is out of date`);
      return 1;
  }
}
