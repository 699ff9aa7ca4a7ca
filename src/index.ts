export type { Field } from "./rename/fields.js";
export { FIELDS, fieldKey, parseFieldKey, resolveField } from "./rename/fields.js";
export type { RenameErrorCode } from "./rename/errors.js";
export {
  isRenameError,
  MetadataReadError,
  MissingFieldError,
  RenameError,
  UnknownFieldError,
} from "./rename/errors.js";
export type {
  CompiledTemplate,
  Element,
  MetadataRecord,
  MetadataTags,
  Result,
} from "./rename/types.js";
export { createMetadataRecord } from "./rename/types.js";
export type { TemplateToken } from "./rename/template-compile.js";
export {
  compileTemplate,
  describeTemplate,
  tokenizeTemplate,
  validateTemplate,
} from "./rename/template-compile.js";
export type { EvaluateOptions } from "./rename/template-evaluate.js";
export { evaluateTemplate } from "./rename/template-evaluate.js";
export { sanitizeFieldValue } from "./rename/sanitize.js";
export type {
  OnRenameProgress,
  PlanRenamesOptions,
  RenamePlanEntry,
  RenameProgressEvent,
} from "./rename/rename-paths.js";
export { buildRenamedPath, planRenames } from "./rename/rename-paths.js";
export type { MediaKind, MetadataSource } from "./media/metadata-source.js";
export { classifyMediaKind, createMediaMetadataSource } from "./media/metadata-source.js";
export { createAudioTagSource } from "./media/audio-tags.js";
export { createExifTagSource } from "./media/exif-tags.js";
