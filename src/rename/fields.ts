import type { MetadataRecord } from "./types.js";

export type Field = "Album" | "Artist" | "Title" | "Track" | "Year";

export const FIELD_KEYS: Readonly<Record<string, Field>> = {
  album: "Album",
  artist: "Artist",
  title: "Title",
  track: "Track",
  year: "Year",
};

export const FIELDS: readonly Field[] = Object.values(FIELD_KEYS);

/**
 * Look up a template key (the letters after `%`). Keys are lowercase only.
 */
export function parseFieldKey(key: string): Field | null {
  return Object.hasOwn(FIELD_KEYS, key) ? FIELD_KEYS[key] : null;
}

export function fieldKey(field: Field): string {
  return field.toLowerCase();
}

/**
 * Resolve a field to its string form, or `undefined` when the record has no value.
 */
export function resolveField(field: Field, record: MetadataRecord): string | undefined {
  switch (field) {
    case "Album":
      return record.albumTitle();
    case "Artist":
      return record.artist();
    case "Title":
      return record.title();
    case "Track":
      return formatNumber(record.trackNumber());
    case "Year":
      return formatNumber(record.year());
  }
}

function formatNumber(value: number | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}
