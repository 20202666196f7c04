import { appendToken, type JsonPointer } from "../json-pointer/index.js";
import type { KdlEntry, NodeBody, SerializerContext } from "./types.js";
import { serializeLiteral } from "./serializeLiteral.js";
import { serializeAttribute } from "./serializeAttribute.js";

// Serialize a node: name, arguments, properties and an optional child block
export function serializeNode(
  name: string,
  body: NodeBody,
  ctx: SerializerContext
): void {
  const { printer } = ctx;
  const at = (...tokens: (string | number)[]): JsonPointer =>
    tokens.reduce<JsonPointer>(appendToken, ctx.path);

  const args = body.args.map((arg, index) =>
    serializeLiteral(arg, at("_args", index))
  );
  const props = body.props.map(
    ([key, value]) => `${key}=${serializeLiteral(value, at("_props", key))}`
  );

  // Explicitly ordered children always come before the remaining keys
  const children: { entry: KdlEntry; path: JsonPointer }[] = [
    ...body.orderedChildren.map((entry, index) => ({
      entry,
      path: at("_children", index, entry[0]),
    })),
    ...body.extra.map((entry) => ({ entry, path: at(entry[0]) })),
  ];

  if (children.length === 0) {
    printer.lineParts(name, ...args, ...props);
    return;
  }

  printer.lineParts(name, ...args, ...props, "{");
  printer.pushIndentation();
  for (const { entry, path } of children) {
    serializeAttribute(entry[0], entry[1], { ...ctx, path });
  }
  printer.popIndentation();
  printer.line("}");
}
