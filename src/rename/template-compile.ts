import type { CompiledTemplate, Element, Result } from "./types.js";
import { UnknownFieldError } from "./errors.js";
import { fieldKey, parseFieldKey } from "./fields.js";

// A `%` only opens a field reference when a lowercase letter follows it.
// Any other `%` stays in the surrounding literal run.
const FIELD_REF_RE = /%([a-z]+)/g;

export type TemplateToken =
  | { kind: "literal"; text: string }
  | { kind: "ref"; key: string };

/**
 * Split a template into literal runs and `%key` references, left to right.
 * Every character of the input lands in exactly one token.
 */
export function tokenizeTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  const re = new RegExp(FIELD_REF_RE.source, "g");
  let cursor = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(template)) !== null) {
    if (match.index > cursor) {
      tokens.push({ kind: "literal", text: template.slice(cursor, match.index) });
    }
    tokens.push({ kind: "ref", key: match[1] });
    cursor = re.lastIndex;
  }
  if (cursor < template.length) {
    tokens.push({ kind: "literal", text: template.slice(cursor) });
  }
  return tokens;
}

/**
 * Compile a filename template such as `"%track - %title"`.
 * Fails on the first key that is not a known field.
 */
export function compileTemplate(template: string): Result<CompiledTemplate, UnknownFieldError> {
  const elements: Element[] = [];
  for (const token of tokenizeTemplate(template)) {
    if (token.kind === "literal") {
      elements.push({ kind: "literal", text: token.text });
      continue;
    }
    const field = parseFieldKey(token.key);
    if (!field) {
      return { ok: false, error: new UnknownFieldError(token.key) };
    }
    elements.push({ kind: "field", field });
  }
  return {
    ok: true,
    value: Object.freeze({ source: template, elements: Object.freeze(elements) }),
  };
}

/**
 * Validate a template string. Returns an array of error messages (empty = valid).
 */
export function validateTemplate(template: string): string[] {
  const errors: string[] = [];
  if (!template) {
    errors.push("Template must not be empty");
    return errors;
  }
  for (const token of tokenizeTemplate(template)) {
    if (token.kind === "ref" && !parseFieldKey(token.key)) {
      errors.push(`Unknown field: %${token.key}`);
    }
  }
  return errors;
}

export function describeTemplate(compiled: CompiledTemplate): string {
  return compiled.elements
    .map((element) => (element.kind === "literal" ? element.text : `%${fieldKey(element.field)}`))
    .join("");
}
