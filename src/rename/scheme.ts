import type { LiteralToken, MetadataKeyToken, Scheme, SchemeToken } from "./types.js";

export const DEFAULT_SCHEME: Scheme = [{ kind: "literal", text: "Renamed-default-" }];

const PATTERN_TOKEN_RE = /\{\{|\}\}|\{([A-Za-z0-9_]+)\}/g;

export function metadataKey(name: string): MetadataKeyToken {
  return { kind: "key", name };
}

export function literal(text: string): LiteralToken {
  return { kind: "literal", text };
}

function toToken(value: unknown): SchemeToken | null {
  if (typeof value === "string") {
    return literal(value);
  }
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return null;
  }
  if (value.kind === "literal" && "text" in value && typeof value.text === "string") {
    return literal(value.text);
  }
  if (value.kind === "key" && "name" in value && typeof value.name === "string" && value.name) {
    return metadataKey(value.name);
  }
  return null;
}

/**
 * Normalize arbitrary input into a scheme. Strings become literals, key tokens are
 * kept; anything else is dropped. Relative order is preserved.
 */
export function compileScheme(input: unknown): SchemeToken[] {
  if (!Array.isArray(input)) {
    return [];
  }
  const scheme: SchemeToken[] = [];
  for (const item of input) {
    const token = toToken(item);
    if (token) {
      scheme.push(token);
    }
  }
  return scheme;
}

/**
 * Parse the textual form `Vacation_{date_time}` into a scheme.
 * `{{` and `}}` stand for literal braces; any other brace that does not enclose
 * a key name is kept as literal text.
 */
export function parseSchemePattern(pattern: string): SchemeToken[] {
  const scheme: SchemeToken[] = [];
  const re = new RegExp(PATTERN_TOKEN_RE.source, "g");
  let text = "";
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(pattern)) !== null) {
    text += pattern.slice(last, match.index);
    last = re.lastIndex;
    if (match[1] === undefined) {
      text += match[0][0];
      continue;
    }
    if (text) {
      scheme.push(literal(text));
      text = "";
    }
    scheme.push(metadataKey(match[1]));
  }
  text += pattern.slice(last);
  if (text) {
    scheme.push(literal(text));
  }
  return scheme;
}

/**
 * Render a scheme in pattern form, doubling braces in literal text.
 * `parseSchemePattern` reads it back for key names of letters, digits and `_`.
 */
export function formatScheme(scheme: Scheme): string {
  return scheme
    .map((token) =>
      token.kind === "literal"
        ? token.text.replace(/\{/g, "{{").replace(/\}/g, "}}")
        : `{${token.name}}`,
    )
    .join("");
}
