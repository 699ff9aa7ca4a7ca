import path from "node:path";
import type { MetadataSource } from "../media/metadata-source.js";
import type { RenameError } from "./errors.js";
import type { EvaluateOptions } from "./template-evaluate.js";
import type { CompiledTemplate, MetadataRecord, Result } from "./types.js";
import { isRenameError } from "./errors.js";
import { evaluateTemplate } from "./template-evaluate.js";

export type RenamePlanEntry = {
  from: string;
  to: string;
};

export type RenameProgressEvent = {
  type: "rename.planned";
  index: number;
  total: number;
  from: string;
  to: string;
};

export type OnRenameProgress = (event: RenameProgressEvent) => void;

export type PlanRenamesOptions = EvaluateOptions & {
  onProgress?: OnRenameProgress;
};

/**
 * Swap the last path component for `name`, keeping the original extension.
 */
export function buildRenamedPath(filePath: string, name: string): string {
  const { root, dir, ext } = path.parse(filePath);
  return path.format({ root, dir, base: `${name}${ext}` });
}

/**
 * Work out the new path for every input, in order. Files are read one at a
 * time and planning stops at the first error.
 */
export async function planRenames(
  compiled: CompiledTemplate,
  paths: readonly string[],
  source: MetadataSource,
  options: PlanRenamesOptions = {},
): Promise<Result<RenamePlanEntry[], RenameError>> {
  const { onProgress, ...evaluateOptions } = options;
  const entries: RenamePlanEntry[] = [];

  for (const [index, from] of paths.entries()) {
    let record: MetadataRecord;
    try {
      record = await source.read(from);
    } catch (err) {
      if (isRenameError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }

    const name = evaluateTemplate(compiled, record, evaluateOptions);
    if (!name.ok) {
      return name;
    }

    const to = buildRenamedPath(from, name.value);
    entries.push({ from, to });
    onProgress?.({ type: "rename.planned", index, total: paths.length, from, to });
  }

  return { ok: true, value: entries };
}
