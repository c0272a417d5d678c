/**
 * Stable textual representation of entities for debugging and golden tests.
 *
 * Atoms read `None`, `True` and single-quoted strings, with
 * two spaces of indentation per level and the closing bracket on the last line.
 */

export type Stringifiable =
  | boolean
  | number
  | string
  | null
  | Entity
  | readonly Stringifiable[]
  | ReadonlyMap<string, Stringifiable>;

export interface Property {
  name: string;
  value: Stringifiable;
}

/**
 * A named bag of properties, rendered as `Name(prop=value, ...)`.
 */
export class Entity {
  constructor(
    readonly name: string,
    readonly properties: readonly Property[]
  ) {}
}

export const property = (name: string, value: Stringifiable): Property => ({ name, value });

// ============================================================================
// Text Helpers
// ============================================================================

/**
 * Prefix every line which is not blank.
 */
export function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => (line.trim().length > 0 ? prefix + line : line))
    .join("\n");
}

/**
 * Prefix every non-empty line except the first one.
 */
export function indentButFirstLine(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line, i) => (i === 0 || line.length === 0 ? line : prefix + line))
    .join("\n");
}

function escapeChar(ch: string, quote: string): string {
  switch (ch) {
    case "\\":
      return "\\\\";
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    default: {
      if (ch === quote) {
        return "\\" + ch;
      }
      const code = ch.charCodeAt(0);
      if (code < 0x20 || code === 0x7f) {
        return "\\x" + code.toString(16).padStart(2, "0");
      }
      return ch;
    }
  }
}

/**
 * Quote a string, preferring single quotes unless the text contains one.
 */
export function quote(text: string): string {
  const quoteChar = text.includes("'") && !text.includes('"') ? '"' : "'";
  let result = quoteChar;
  for (const ch of text) {
    result += escapeChar(ch, quoteChar);
  }
  return result + quoteChar;
}

function dumpString(text: string): string {
  if (!text.includes("\n") || text.includes("\r") || text.includes('"""')) {
    return quote(text);
  }

  // Multi-line strings stay readable in diffs.
  const escaped = text.replace(/\\/g, "\\\\");
  const lines = escaped.endsWith("\n") ? escaped.slice(0, -1).split("\n") : escaped.split("\n");
  const indented = lines.map((line) => `  ${line}`).join("\n");
  return `textwrap.dedent("""\\\n${indented}""")`;
}

// ============================================================================
// Dump
// ============================================================================

export function dump(value: Stringifiable): string {
  if (value === null) {
    return "None";
  }

  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }

  if (typeof value === "number") {
    return String(value);
  }

  if (typeof value === "string") {
    return dumpString(value);
  }

  if (value instanceof Entity) {
    if (value.properties.length === 0) {
      return `${value.name}()`;
    }

    const parts = value.properties.map(
      (prop) => `  ${prop.name}=${indentButFirstLine(dump(prop.value), "  ")}`
    );
    return `${value.name}(\n${parts.join(",\n")})`;
  }

  if (isStringifiableArray(value)) {
    if (value.length === 0) {
      return "[]";
    }
    return `[\n${value.map((item) => indent(dump(item), "  ")).join(",\n")}]`;
  }

  if (value.size === 0) {
    return "{}";
  }
  const entries = [...value].map(([key, item]) => indent(`${dump(key)}: ${dump(item)}`, "  "));
  return `{\n${entries.join(",\n")}}`;
}

function isStringifiableArray(
  value: readonly Stringifiable[] | ReadonlyMap<string, Stringifiable>
): value is readonly Stringifiable[] {
  return Array.isArray(value);
}
