import { appendToken, type JsonPointer } from "../json-pointer/index.js";
import {
  KdlError,
  cyclicStructure,
  invalidReservedKey,
  unsupportedAttributeType,
} from "./errors.js";
import type {
  KdlDocument,
  KdlEntry,
  KdlScalar,
  KdlValue,
  NodeBody,
  RenderOptions,
} from "./types.js";
import { describeHostType, isPlainObject, previewHostValue } from "./utils.js";

export interface NormaliseContext {
  path: JsonPointer;
  // Mappings and sequences currently being converted, outermost first
  ancestors: readonly object[];
  floatNumbers: boolean;
}

type HostEntry = readonly [key: string, value: unknown];

const rootContext = (options: RenderOptions = {}): NormaliseContext => ({
  path: [],
  ancestors: [],
  floatNumbers: options.floatNumbers ?? false,
});

function toScalar(
  value: unknown,
  ctx: NormaliseContext
): KdlScalar | undefined {
  if (value === null) return { kind: "null" };
  switch (typeof value) {
    case "boolean":
      return { kind: "bool", value };
    case "number":
      return !ctx.floatNumbers && Number.isInteger(value)
        ? { kind: "int", value }
        : { kind: "float", value };
    case "bigint":
      return { kind: "int", value };
    case "string":
      return { kind: "string", value };
    default:
      return undefined;
  }
}

function toMapKey(key: unknown, ctx: NormaliseContext): string {
  switch (typeof key) {
    case "string":
      return key;
    case "number":
    case "boolean":
    case "bigint":
      return String(key);
    default:
      throw unsupportedAttributeType(
        ctx.path,
        previewHostValue(key),
        `${describeHostType(key)} key`,
        previewHostValue(key)
      );
  }
}

/**
 * Entries of a plain object or Map in insertion order, or undefined when
 * the value is not a mapping. Entries whose value is undefined are dropped.
 */
function mappingEntries(
  value: unknown,
  ctx: NormaliseContext
): HostEntry[] | undefined {
  if (value instanceof Map) {
    const entries: HostEntry[] = [];
    for (const [key, item] of value) {
      if (item === undefined) continue;
      entries.push([toMapKey(key, ctx), item]);
    }
    return entries;
  }
  if (isPlainObject(value)) {
    return Object.entries(value).filter(([, item]) => item !== undefined);
  }
  return undefined;
}

function enter(value: object, ctx: NormaliseContext): NormaliseContext {
  if (ctx.ancestors.includes(value)) {
    throw cyclicStructure(ctx.path);
  }
  return { ...ctx, ancestors: [...ctx.ancestors, value] };
}

function toArgs(raw: unknown, ctx: NormaliseContext): KdlScalar[] {
  if (!Array.isArray(raw)) {
    throw invalidReservedKey(
      ctx.path,
      "_args",
      `expected a sequence of scalars, got ${describeHostType(raw)}`
    );
  }
  return raw.map((item: unknown, index) => {
    const scalar = toScalar(item, ctx);
    if (!scalar) {
      throw invalidReservedKey(
        appendToken(ctx.path, index),
        "_args",
        `element ${index} is ${describeHostType(item)}, expected a scalar`
      );
    }
    return scalar;
  });
}

function toProps(
  raw: unknown,
  ctx: NormaliseContext
): (readonly [string, KdlScalar])[] {
  const entries = mappingEntries(raw, ctx);
  if (!entries) {
    throw invalidReservedKey(
      ctx.path,
      "_props",
      `expected a mapping of scalars, got ${describeHostType(raw)}`
    );
  }
  return entries.map(([key, item]) => {
    const scalar = toScalar(item, ctx);
    if (!scalar) {
      throw invalidReservedKey(
        appendToken(ctx.path, key),
        "_props",
        `property ${key} is ${describeHostType(item)}, expected a scalar`
      );
    }
    return [key, scalar] as const;
  });
}

function toOrderedChildren(raw: unknown, ctx: NormaliseContext): KdlEntry[] {
  if (!Array.isArray(raw)) {
    throw invalidReservedKey(
      ctx.path,
      "_children",
      `expected a sequence of single-entry mappings, got ${describeHostType(raw)}`
    );
  }
  const inner = enter(raw, ctx);

  return raw.map((element: unknown, index): KdlEntry => {
    const elementPath = appendToken(ctx.path, index);
    const entries = mappingEntries(element, { ...inner, path: elementPath });
    if (!entries) {
      throw invalidReservedKey(
        elementPath,
        "_children",
        `element ${index} is ${describeHostType(element)}, expected a single-entry mapping`
      );
    }
    const [entry, ...rest] = entries;
    if (!entry || rest.length > 0) {
      throw invalidReservedKey(
        elementPath,
        "_children",
        `element ${index} has ${entries.length} keys, expected exactly one`
      );
    }
    // Non-empty entries imply a mapping, hence an object
    const elementCtx =
      typeof element === "object" && element !== null
        ? enter(element, { ...inner, path: elementPath })
        : inner;

    const [key, value] = entry;
    return [
      key,
      toKdlValue(key, value, {
        ...elementCtx,
        path: appendToken(elementPath, key),
      }),
    ];
  });
}

function toNodeBody(entries: HostEntry[], ctx: NormaliseContext): NodeBody {
  let args: KdlScalar[] = [];
  let props: (readonly [string, KdlScalar])[] = [];
  let orderedChildren: KdlEntry[] = [];
  const extra: KdlEntry[] = [];

  for (const [key, raw] of entries) {
    const entryCtx = { ...ctx, path: appendToken(ctx.path, key) };
    switch (key) {
      case "_args":
        args = toArgs(raw, entryCtx);
        break;
      case "_props":
        props = toProps(raw, entryCtx);
        break;
      case "_children":
        orderedChildren = toOrderedChildren(raw, entryCtx);
        break;
      default:
        extra.push([key, toKdlValue(key, raw, entryCtx)]);
    }
  }

  return { args, props, orderedChildren, extra };
}

/**
 * Convert a host value bound to `name` into the typed value model.
 * Mappings become node bodies with their reserved keys split out.
 */
export function toKdlValue(
  name: string,
  value: unknown,
  ctx: NormaliseContext = rootContext()
): KdlValue {
  const scalar = toScalar(value, ctx);
  if (scalar) return scalar;

  if (Array.isArray(value)) {
    const inner = enter(value, ctx);
    return {
      kind: "sequence",
      items: value.map((item: unknown, index) =>
        toKdlValue(name, item, { ...inner, path: appendToken(ctx.path, index) })
      ),
    };
  }

  const entries = mappingEntries(value, ctx);
  if (entries && typeof value === "object" && value !== null) {
    return { kind: "mapping", body: toNodeBody(entries, enter(value, ctx)) };
  }

  throw unsupportedAttributeType(
    ctx.path,
    name,
    describeHostType(value),
    previewHostValue(value)
  );
}

/**
 * Convert a host mapping into a document. Root keys are plain node names:
 * `_args`, `_props` and `_children` are only reserved inside nodes.
 */
export function toKdlDocument(
  root: unknown,
  options?: RenderOptions
): KdlDocument {
  const rootCtx = rootContext(options);
  const entries = mappingEntries(root, rootCtx);
  if (!entries || typeof root !== "object" || root === null) {
    throw new KdlError({
      type: "invalidDocumentRoot",
      valueType: describeHostType(root),
    });
  }
  const ctx = enter(root, rootCtx);

  return {
    entries: entries.map(([key, value]): KdlEntry => [
      key,
      toKdlValue(key, value, { ...ctx, path: [key] }),
    ]),
  };
}
