import { ok, err } from "@kdlgen/core/result";
import { VFS, ReadFileResult, WriteFileResult } from "./VFS.js";

export class MemoryVFS implements VFS {
  private files: Map<string, string>;
  readonly writes: string[] = [];

  constructor(files: Record<string, string> | Map<string, string> = {}) {
    this.files = files instanceof Map ? files : new Map(Object.entries(files));
  }

  async readFile(path: string): Promise<ReadFileResult> {
    const content = this.files.get(path);
    if (content === undefined) {
      return err({ type: "notFound", path });
    }
    return ok(content);
  }

  async writeFile(path: string, content: string): Promise<WriteFileResult> {
    this.files.set(path, content);
    this.writes.push(path);
    return ok(undefined);
  }

  get(path: string): string | undefined {
    return this.files.get(path);
  }
}
