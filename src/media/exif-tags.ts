import type { MetadataSource } from "./metadata-source.js";
import { MetadataReadError } from "../rename/errors.js";
import { createMetadataRecord } from "../rename/types.js";

const EXIF_TAGS = [
  "Artist",
  "XPTitle",
  "ImageDescription",
  "DateTimeOriginal",
  "CreateDate",
] as const;

/**
 * Tags for still images. Images have no album or track, so those fields are
 * always absent.
 */
export function createExifTagSource(): MetadataSource {
  return {
    async read(filePath) {
      const data = await parseExif(filePath);
      if (!data) {
        return createMetadataRecord({});
      }
      const captureDate = resolveDate(data.DateTimeOriginal ?? data.CreateDate);
      return createMetadataRecord({
        artist: readString(data.Artist),
        title: readString(data.XPTitle) ?? readString(data.ImageDescription),
        year: captureDate?.getFullYear(),
      });
    },
  };
}

async function parseExif(filePath: string): Promise<Record<string, unknown> | undefined> {
  try {
    const exifr = await import("exifr");
    const data: Record<string, unknown> | undefined = await exifr.parse(filePath, {
      pick: [...EXIF_TAGS],
    });
    return data;
  } catch (err) {
    throw new MetadataReadError(filePath, err);
  }
}

function readString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function resolveDate(value: unknown): Date | null {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value === "string") {
    const d = new Date(value);
    if (!Number.isNaN(d.getTime())) {
      return d;
    }
  }
  return null;
}
