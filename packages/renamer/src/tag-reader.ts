import { parseFile } from "music-metadata";
import { PerFileError, errnoOf } from "@deckname/core";
import type { RawTags } from "@deckname/core";

export interface TagReader {
  read(filePath: string): Promise<RawTags>;
}

/** The subset of a music-metadata parse result the renamer looks at. */
export interface ParsedTags {
  common: {
    artist?: string;
    albumartist?: string;
    title?: string;
    album?: string;
    year?: number;
    date?: string;
    label?: string[];
    bpm?: number;
    key?: string;
    track?: { no: number | null };
  };
  native?: Record<string, ReadonlyArray<{ id: string; value: unknown }>>;
}

const MIX_TAG_ID_RE = /(^|:)mix(name)?$/i;

export function tagsFromParsed(parsed: ParsedTags): RawTags {
  const { common } = parsed;
  return {
    artist: common.artist,
    albumartist: common.albumartist,
    title: common.title,
    album: common.album,
    date: common.date ?? (common.year === undefined ? undefined : String(common.year)),
    label: common.label?.[0],
    bpm: common.bpm === undefined ? undefined : String(common.bpm),
    key: common.key,
    track: common.track?.no ? String(common.track.no) : undefined,
    mix: findNativeMix(parsed.native)
  };
}

function findNativeMix(native: ParsedTags["native"]): string | undefined {
  for (const tags of Object.values(native ?? {})) {
    for (const tag of tags) {
      if (MIX_TAG_ID_RE.test(tag.id) && typeof tag.value === "string" && tag.value.trim()) {
        return tag.value;
      }
    }
  }
  return undefined;
}

export class MusicMetadataTagReader implements TagReader {
  async read(filePath: string): Promise<RawTags> {
    try {
      const parsed = await parseFile(filePath, { duration: false, skipCovers: true });
      return tagsFromParsed(parsed);
    } catch (error) {
      if (errnoOf(error) !== undefined) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new PerFileError("unreadable_metadata", filePath, `Unreadable metadata: ${detail}`);
    }
  }
}
