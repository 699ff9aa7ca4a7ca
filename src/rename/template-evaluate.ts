import type { Field } from "./fields.js";
import type { CompiledTemplate, MetadataRecord, Result } from "./types.js";
import { MissingFieldError } from "./errors.js";
import { resolveField } from "./fields.js";

export type EvaluateOptions = {
  /** Applied to each resolved field value; literal text is left alone. */
  formatValue?: (field: Field, value: string) => string;
};

/**
 * Build a file name from a compiled template and one file's tags.
 * Stops at the first field the record has no value for.
 */
export function evaluateTemplate(
  compiled: CompiledTemplate,
  record: MetadataRecord,
  options: EvaluateOptions = {},
): Result<string, MissingFieldError> {
  let name = "";
  for (const element of compiled.elements) {
    if (element.kind === "literal") {
      name += element.text;
      continue;
    }
    const value = resolveField(element.field, record);
    if (value === undefined) {
      return { ok: false, error: new MissingFieldError(element.field) };
    }
    name += options.formatValue ? options.formatValue(element.field, value) : value;
  }
  return { ok: true, value: name };
}
