import jsoncParser from "jsonc-parser";

const STRICT_JSON = { disallowComments: true, allowTrailingComma: false } as const;

export type JsonValueSource = {
  /** Value type as reported by the parse tree (`object`, `number`, `null`, ...). */
  type: string;
  /** The value exactly as written in the input. */
  text: string;
};

/**
 * Returns the source text of a top-level property value. With duplicate keys
 * the last one wins, matching `JSON.parse`.
 */
export function findPropertySource(raw: string, key: string): JsonValueSource | undefined {
  const root = jsoncParser.parseTree(raw, undefined, STRICT_JSON);
  if (!root || root.type !== "object") return undefined;
  let found: JsonValueSource | undefined;
  for (const property of root.children ?? []) {
    const [keyNode, valueNode] = property.children ?? [];
    if (!keyNode || !valueNode || keyNode.value !== key) continue;
    found = {
      type: valueNode.type,
      text: raw.slice(valueNode.offset, valueNode.offset + valueNode.length),
    };
  }
  return found;
}

/**
 * Re-emits JSON without whitespace outside strings. Keys, numbers and escapes
 * keep their source spelling and order. Returns undefined for invalid JSON.
 */
export function compactJson(source: string): string | undefined {
  const parts: string[] = [];
  const errors: number[] = [];
  const keep = (offset: number, length: number) => {
    parts.push(source.slice(offset, offset + length));
  };

  jsoncParser.visit(
    source,
    {
      onObjectBegin: (offset, length) => keep(offset, length),
      onObjectEnd: (offset, length) => keep(offset, length),
      onArrayBegin: (offset, length) => keep(offset, length),
      onArrayEnd: (offset, length) => keep(offset, length),
      onObjectProperty: (_property, offset, length) => keep(offset, length),
      onLiteralValue: (_value, offset, length) => keep(offset, length),
      onSeparator: (_character, offset, length) => keep(offset, length),
      onError: (error) => {
        errors.push(error);
      },
    },
    STRICT_JSON,
  );

  return errors.length > 0 ? undefined : parts.join("");
}
