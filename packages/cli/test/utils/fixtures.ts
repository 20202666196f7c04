import dedent from "dedent";

export const CONFIG_PATH = "/home/user/kdlgen.yaml";
export const OUTPUT_PATH = "/home/user/niri/config.kdl";

export const CONFIG_TEXT = dedent`
  output: niri/config.kdl
  settings:
    input:
      keyboard:
        layout: us
    binds:
      Mod+T:
        spawn: alacritty
  extraConfig: |
    include "extra.kdl"
` + "\n";

export const RENDERED = [
  "input {",
  "\tkeyboard {",
  '\t\tlayout "us"',
  "\t}",
  "}",
  "binds {",
  "\tMod+T {",
  '\t\tspawn "alacritty"',
  "\t}",
  "}",
].join("\n");

// Rendered document, its trailing newline, the separating newline, then the extra lines
export const EXPECTED_OUTPUT = RENDERED + "\n" + "\n" + 'include "extra.kdl"\n';
