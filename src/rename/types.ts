import type { Field } from "./fields.js";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Element = { kind: "literal"; text: string } | { kind: "field"; field: Field };

export type CompiledTemplate = {
  readonly source: string;
  readonly elements: readonly Element[];
};

/**
 * Tag values read from one media file. Accessors return `undefined` when the
 * file carries no value for that tag.
 */
export interface MetadataRecord {
  albumTitle(): string | undefined;
  artist(): string | undefined;
  title(): string | undefined;
  trackNumber(): number | undefined;
  year(): number | undefined;
}

export type MetadataTags = {
  album?: string;
  artist?: string;
  title?: string;
  track?: number;
  year?: number;
};

export function createMetadataRecord(tags: MetadataTags): MetadataRecord {
  const { album, artist, title, track, year } = tags;
  return {
    albumTitle: () => album,
    artist: () => artist,
    title: () => title,
    trackNumber: () => track,
    year: () => year,
  };
}
