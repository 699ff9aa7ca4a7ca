import path from "node:path";
import type { MetadataRecord } from "../rename/types.js";

export interface MetadataSource {
  /** Rejects with a MetadataReadError when the file's tags cannot be read. */
  read(filePath: string): Promise<MetadataRecord>;
}

export type MediaKind = "audio" | "image" | "unknown";

export const AUDIO_EXTENSIONS = new Set([
  ".mp3",
  ".flac",
  ".ogg",
  ".opus",
  ".m4a",
  ".mp4",
  ".aac",
  ".wav",
  ".aiff",
  ".wma",
  ".ape",
  ".wv",
]);

export const IMAGE_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".heic",
  ".tif",
  ".tiff",
  ".dng",
  ".cr2",
  ".nef",
  ".arw",
]);

/**
 * Classify a file extension (with leading dot) into a MediaKind.
 */
export function classifyMediaKind(ext: string): MediaKind {
  const lower = ext.toLowerCase();
  if (AUDIO_EXTENSIONS.has(lower)) {
    return "audio";
  }
  if (IMAGE_EXTENSIONS.has(lower)) {
    return "image";
  }
  return "unknown";
}

export type MediaMetadataSourceParams = {
  audio: MetadataSource;
  image: MetadataSource;
};

/**
 * Route each path to the image or audio reader by extension. Anything that is
 * not a known image goes to the audio reader.
 */
export function createMediaMetadataSource(params: MediaMetadataSourceParams): MetadataSource {
  return {
    read(filePath) {
      const kind = classifyMediaKind(path.extname(filePath));
      return kind === "image" ? params.image.read(filePath) : params.audio.read(filePath);
    },
  };
}
