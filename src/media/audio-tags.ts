import type { IAudioMetadata } from "music-metadata";
import type { MetadataSource } from "./metadata-source.js";
import { MetadataReadError } from "../rename/errors.js";
import { createMetadataRecord } from "../rename/types.js";

export function createAudioTagSource(): MetadataSource {
  return {
    async read(filePath) {
      const { common } = await parseAudioFile(filePath);
      return createMetadataRecord({
        album: common.album,
        artist: common.artist,
        title: common.title,
        track: common.track.no ?? undefined,
        year: common.year,
      });
    },
  };
}

async function parseAudioFile(filePath: string): Promise<IAudioMetadata> {
  try {
    // Dynamic import to avoid loading music-metadata if not needed
    const mm = await import("music-metadata");
    return await mm.parseFile(filePath, { skipCovers: true, duration: false });
  } catch (err) {
    throw new MetadataReadError(filePath, err);
  }
}
