/**
 * Make a tag value safe inside a single path component: strip control chars
 * and null bytes, replace path separators, and collapse runs of underscores.
 * A value of `.` or `..` becomes `_`.
 */
export function sanitizeFieldValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  let clean = value.replace(/[\x00-\x1f\x7f]/g, "");
  clean = clean.replace(/[/\\]/g, "_");
  clean = clean.replace(/_+/g, "_");
  clean = clean.trim();
  return clean === "." || clean === ".." ? "_" : clean;
}
