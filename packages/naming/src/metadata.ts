import type { MetadataField, MetadataRecord, RawTags } from "@deckname/core";
import { parseKey } from "./key-notation";

type TagSource = Exclude<MetadataField, "camelot">;

const TAG_ALIASES: Record<TagSource, readonly string[]> = {
  artist: ["artist", "tpe1", "albumartist", "tpe2"],
  title: ["title", "tit2"],
  album: ["album", "talb"],
  year: ["year", "date", "tdrc", "tyer", "originaldate"],
  label: ["label", "publisher", "organization", "tpub"],
  bpm: ["bpm", "tbpm", "tempo"],
  key: ["key", "initialkey", "tkey"],
  mix: ["mix", "mixname"],
  track: ["track", "tracknumber", "trck"]
};

const MIX_MARKER_RE =
  /\b(mix|remix|rework|edit|vip|version|bootleg|dub|extended|radio|club|instrumental|acapella)\b/i;
const BRACKET_SUFFIX_RE = /[([{]\s*([^)\]}]{2,80}?)\s*[)\]}]\s*$/;
const DASH_SUFFIX_RE = /\s[-–—]\s*([^-–—]{2,80}?)\s*$/;

/**
 * Builds a metadata record from raw tag values. Lookups are
 * case-insensitive across common tag aliases; anything missing or
 * unparseable is simply left out of the record.
 */
export function normalizeMetadata(tags: RawTags): MetadataRecord {
  const lookup = indexTags(tags);
  const read = (field: TagSource): string | undefined => {
    for (const alias of TAG_ALIASES[field]) {
      const value = squashSpaces(lookup.get(alias));
      if (value) {
        return value;
      }
    }
    return undefined;
  };

  const rawTitle = read("title");
  const mix = read("mix") ?? (rawTitle ? inferMix(rawTitle) : undefined);
  const key = parseKey(read("key"));

  const record: Partial<Record<MetadataField, string>> = {};
  const assign = (field: MetadataField, value: string | undefined): void => {
    if (value) {
      record[field] = value;
    }
  };

  assign("artist", read("artist"));
  assign("title", rawTitle && mix ? stripMixFromTitle(rawTitle, mix) : rawTitle);
  assign("album", read("album"));
  assign("year", extractYear(read("year")));
  assign("label", read("label"));
  assign("bpm", normalizeBpm(read("bpm")));
  assign("key", key.key);
  assign("camelot", key.camelot);
  assign("mix", mix);
  assign("track", extractTrackNumber(read("track")));

  return Object.freeze(record);
}

export function squashSpaces(value: string | undefined): string | undefined {
  const squashed = value?.replace(/\s+/g, " ").trim();
  return squashed ? squashed : undefined;
}

export function extractYear(value: string | undefined): string | undefined {
  return value ? /\b(19\d{2}|20\d{2})\b/.exec(value)?.[1] : undefined;
}

export function extractTrackNumber(value: string | undefined): string | undefined {
  const match = value ? /^\s*(\d{1,3})/.exec(value) : null;
  if (!match) {
    return undefined;
  }
  const track = Number.parseInt(match[1], 10);
  if (track === 0) {
    return undefined;
  }
  return track < 100 ? String(track).padStart(2, "0") : String(track);
}

export function normalizeBpm(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  let bpm = Number(value.trim());
  if (!Number.isFinite(bpm)) {
    const embedded = /(\d{2,3}(?:\.\d+)?)/.exec(value);
    bpm = embedded ? Number.parseFloat(embedded[1]) : Number.NaN;
  }
  if (!Number.isFinite(bpm) || bpm < 10) {
    return undefined;
  }
  return String(Math.round(bpm));
}

export function inferMix(title: string): string | undefined {
  for (const pattern of [BRACKET_SUFFIX_RE, DASH_SUFFIX_RE]) {
    const inner = squashSpaces(pattern.exec(title)?.[1]);
    if (inner && MIX_MARKER_RE.test(inner)) {
      return inner;
    }
  }
  return undefined;
}

export function stripMixFromTitle(title: string, mix: string): string {
  const escaped = escapeRegExp(mix).replace(/ /g, "\\s+");
  const patterns = [
    new RegExp(`\\s*[([{]\\s*${escaped}\\s*[)\\]}]\\s*$`, "i"),
    new RegExp(`\\s[-–—]\\s*${escaped}\\s*$`, "i")
  ];
  for (const pattern of patterns) {
    const stripped = title.replace(pattern, "").trim();
    if (stripped !== title && stripped.length > 0) {
      return stripped;
    }
  }
  return title;
}

function indexTags(tags: RawTags): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [name, value] of Object.entries(tags)) {
    const alias = name.trim().toLowerCase();
    if (value !== undefined && !lookup.has(alias)) {
      lookup.set(alias, value);
    }
  }
  return lookup;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
