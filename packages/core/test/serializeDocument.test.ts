import { describe, it, expect } from "vitest";
import { renderKdl, tryRenderKdl } from "../src/kdl/index.js";

const kdl = (...lines: string[]): string => lines.join("\n") + "\n";

describe("renderKdl", () => {
  it("should render nested mappings as indented blocks", () => {
    const result = renderKdl({ input: { keyboard: { layout: "us" } } });

    expect(result).toBe(
      kdl("input {", "\tkeyboard {", '\t\tlayout "us"', "\t}", "}")
    );
  });

  it("should render an empty document as a single newline", () => {
    expect(renderKdl({})).toBe("\n");
    expect(renderKdl(new Map())).toBe("\n");
  });

  it("should render root entries in order, one block each", () => {
    const result = renderKdl({
      "prefer-no-csd": [],
      "screenshot-path": "~/Pictures/%Y-%m-%d.png",
      "hotkey-overlay": { "skip-at-startup": [] },
    });

    expect(result).toBe(
      kdl(
        "prefer-no-csd",
        'screenshot-path "~/Pictures/%Y-%m-%d.png"',
        "hotkey-overlay {",
        "\tskip-at-startup",
        "}"
      )
    );
  });

  it("should render key bindings with properties and argument lists", () => {
    const result = renderKdl({
      binds: {
        "Mod+TouchpadScrollDown": {
          _props: { "cooldown-ms": 500 },
          "focus-workspace-down": [],
        },
        "Mod+T": { spawn: "alacritty" },
        XF86AudioRaiseVolume: {
          "spawn-sh": ["wpctl", "set-volume", "@DEFAULT_AUDIO_SINK@", "0.1+"],
        },
      },
    });

    expect(result).toBe(
      kdl(
        "binds {",
        "\tMod+TouchpadScrollDown cooldown-ms=500 {",
        "\t\tfocus-workspace-down",
        "\t}",
        "\tMod+T {",
        '\t\tspawn "alacritty"',
        "\t}",
        "\tXF86AudioRaiseVolume {",
        '\t\tspawn-sh "wpctl" "set-volume" "@DEFAULT_AUDIO_SINK@" "0.1+"',
        "\t}",
        "}"
      )
    );
  });

  it("should not treat reserved keys at the root as reserved", () => {
    expect(renderKdl({ _args: [1, 2] })).toBe(kdl("_args 1 2"));
  });

  it("should write empty names as they are", () => {
    expect(renderKdl({ "": [1] })).toBe(kdl(" 1"));
    expect(renderKdl({ "": { _args: ["x"] } })).toBe(kdl(' "x"'));
  });

  it("should read every number as a float when ints are given as bigint", () => {
    const settings = {
      opacity: 1,
      scale: 1.5,
      gaps: 16n,
      n: { _args: [2, 3n], _props: { width: 0 } },
    };

    expect(renderKdl(settings, { floatNumbers: true })).toBe(
      kdl("opacity 1.0", "scale 1.5", "gaps 16", "n 2.0 3 width=0.0")
    );
    expect(renderKdl(settings)).toBe(
      kdl("opacity 1", "scale 1.5", "gaps 16", "n 2 3 width=0")
    );
  });

  it("should preserve Map insertion order, including integer-like keys", () => {
    const result = renderKdl({
      workspace: new Map<unknown, unknown>([
        ["2", "b"],
        [1, "a"],
      ]),
    });

    expect(result).toBe(kdl("workspace {", '\t2 "b"', '\t1 "a"', "}"));
  });

  it("should skip mapping entries whose value is undefined", () => {
    expect(renderKdl({ a: 1, b: undefined, c: { d: undefined } })).toBe(
      kdl("a 1", "c")
    );
  });

  it("should render shared, non-cyclic values at every place they occur", () => {
    const shared = { x: 1 };

    expect(renderKdl({ a: shared, b: shared })).toBe(
      kdl("a {", "\tx 1", "}", "b {", "\tx 1", "}")
    );
  });

  it("should produce byte-identical output for the same input", () => {
    const settings = {
      layout: {
        gaps: 16,
        "preset-column-widths": {
          _children: [{ proportion: 0.33333 }, { proportion: 0.5 }],
        },
      },
      outputs: [{ _args: ["eDP-1"], scale: 2 }],
    };

    expect(renderKdl(settings)).toBe(renderKdl(settings));
  });
});

describe("tryRenderKdl", () => {
  it("should return the rendered document on success", () => {
    expect(tryRenderKdl({ a: true })).toEqual({ success: true, data: "a true\n" });
  });

  it("should return the error detail instead of throwing", () => {
    expect(tryRenderKdl({ n: { _args: "oops" } })).toEqual({
      success: false,
      error: {
        type: "invalidReservedKey",
        path: "/n/_args",
        key: "_args",
        reason: "expected a sequence of scalars, got string",
      },
    });
  });

  it("should report a root that is not a mapping", () => {
    expect(tryRenderKdl([1])).toEqual({
      success: false,
      error: { type: "invalidDocumentRoot", valueType: "array" },
    });
    expect(tryRenderKdl(null)).toEqual({
      success: false,
      error: { type: "invalidDocumentRoot", valueType: "null" },
    });
  });
});
