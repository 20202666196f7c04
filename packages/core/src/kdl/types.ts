import type { JsonPointer } from "../json-pointer/index.js";
import type { Printer } from "./Printer.js";

export type KdlNull = { kind: "null" };
export type KdlBool = { kind: "bool"; value: boolean };
export type KdlInt = { kind: "int"; value: number | bigint };
export type KdlFloat = { kind: "float"; value: number };
export type KdlString = { kind: "string"; value: string };

export type KdlScalar = KdlNull | KdlBool | KdlInt | KdlFloat | KdlString;

/**
 * A named entry of a mapping, kept in insertion order.
 */
export type KdlEntry = readonly [name: string, value: KdlValue];

/**
 * The body of a node: a mapping with its reserved keys already split out.
 *
 * - `args` come from `_args`
 * - `props` come from `_props`, in that mapping's order
 * - `orderedChildren` come from `_children`, one entry per element
 * - `extra` holds every other key of the mapping, in mapping order
 */
export interface NodeBody {
  args: readonly KdlScalar[];
  props: readonly (readonly [key: string, value: KdlScalar])[];
  orderedChildren: readonly KdlEntry[];
  extra: readonly KdlEntry[];
}

export type KdlMapping = { kind: "mapping"; body: NodeBody };
export type KdlSequence = { kind: "sequence"; items: readonly KdlValue[] };

export type KdlValue = KdlScalar | KdlMapping | KdlSequence;

/**
 * The root of a document. Root keys are never reserved.
 */
export interface KdlDocument {
  entries: readonly KdlEntry[];
}

export interface RenderOptions {
  /**
   * Read every JS number as a Float and only bigint values as Ints.
   * For sources that keep the distinction themselves, such as YAML parsed
   * with `intAsBigInt`.
   */
  floatNumbers?: boolean;
}

// Internal context for recursive serialization
export interface SerializerContext {
  printer: Printer;
  path: JsonPointer;
}
