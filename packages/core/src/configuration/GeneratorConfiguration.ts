import { z } from "zod";
import { isPlainObject } from "../kdl/utils.js";

export type SettingsMapping =
  | Record<string, unknown>
  | ReadonlyMap<unknown, unknown>;

const isSettingsMapping = (value: unknown): value is SettingsMapping =>
  value instanceof Map || isPlainObject(value);

export const GeneratorConfiguration = z.object({
  output: z
    .string()
    .min(1)
    .describe(
      `Path of the generated KDL file, relative to the directory of the configuration file`
    )
    .default("config.kdl"),
  settings: z
    .custom<SettingsMapping>(isSettingsMapping, {
      error: "settings must be a mapping",
    })
    .describe(
      `Configuration written as nested mappings, sequences and scalars. The keys _args, _props and _children of a mapping set a node's arguments, properties and ordered children`
    )
    .default({}),
  extraConfig: z
    .string()
    .describe(`Extra configuration lines appended verbatim after the generated document`)
    .default(""),
});

export type GeneratorConfiguration = z.infer<typeof GeneratorConfiguration>;
