import { appendToken } from "../json-pointer/index.js";
import { unsupportedAttributeType } from "./errors.js";
import type { KdlValue, SerializerContext } from "./types.js";
import { isFlatSequence, previewKdlValue } from "./utils.js";
import { serializeLiteral } from "./serializeLiteral.js";
import { serializeNode } from "./serializeNode.js";

// Main attribute serializer - picks the encoding from the value's kind
export function serializeAttribute(
  name: string,
  value: KdlValue,
  ctx: SerializerContext
): void {
  const { printer, path } = ctx;

  switch (value.kind) {
    case "null":
    case "bool":
    case "int":
    case "float":
    case "string":
      printer.line(`${name} ${serializeLiteral(value, path)}`);
      return;

    case "mapping":
      serializeNode(name, value.body, ctx);
      return;

    case "sequence": {
      const { items } = value;

      // Scalars only: one node carrying every element as an argument
      if (isFlatSequence(items)) {
        printer.lineParts(
          name,
          ...items.map((item, index) =>
            serializeLiteral(item, appendToken(path, index))
          )
        );
        return;
      }

      // Otherwise: one sibling node per element, all under the same name
      items.forEach((item, index) => {
        serializeAttribute(name, item, {
          ...ctx,
          path: appendToken(path, index),
        });
      });
      return;
    }

    default: {
      const unknownValue: never = value;
      throw unsupportedAttributeType(
        path,
        name,
        describeUnknownKind(unknownValue),
        previewKdlValue(unknownValue)
      );
    }
  }
}

function describeUnknownKind(value: { kind?: unknown }): string {
  return typeof value.kind === "string" ? value.kind : typeof value;
}
