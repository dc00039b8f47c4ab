import { describe, expect, it } from "vitest";
import {
  extractTrackNumber,
  extractYear,
  inferMix,
  normalizeBpm,
  normalizeMetadata,
  stripMixFromTitle
} from "../metadata";

describe("normalizeMetadata", () => {
  it("maps frame ids and cleans values", () => {
    const record = normalizeMetadata({
      TPE1: "  Nova   Drift ",
      TIT2: "Lowlight (Extended Mix)",
      TBPM: "122.6",
      TKEY: "F# minor",
      TDRC: "2019-11-13",
      TRCK: "3/14",
      TPUB: "Halfmoon Records"
    });

    expect(record).toEqual({
      artist: "Nova Drift",
      title: "Lowlight",
      year: "2019",
      label: "Halfmoon Records",
      bpm: "123",
      key: "F#m",
      camelot: "11A",
      mix: "Extended Mix",
      track: "03"
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("prefers an explicit mix tag over the title suffix", () => {
    const record = normalizeMetadata({ title: "Lowlight (Extended Mix)", mix: "Dub" });
    expect(record.mix).toBe("Dub");
    expect(record.title).toBe("Lowlight (Extended Mix)");
  });

  it("leaves non-mix parentheticals in the title", () => {
    const record = normalizeMetadata({ title: "Lowlight (feat. Aya)" });
    expect(record).toEqual({ title: "Lowlight (feat. Aya)" });
  });

  it("reads a dashed mix suffix", () => {
    const record = normalizeMetadata({ title: "Lowlight - VIP" });
    expect(record.mix).toBe("VIP");
    expect(record.title).toBe("Lowlight");
  });

  it("accepts wheel codes as the key tag", () => {
    const record = normalizeMetadata({ initialkey: "8A" });
    expect(record).toEqual({ key: "Am", camelot: "8A" });
  });

  it("leaves missing and blank fields absent", () => {
    expect(normalizeMetadata({})).toEqual({});
    expect(normalizeMetadata({ artist: "   ", album: undefined, key: "??" })).toEqual({});
  });
});

describe("field parsers", () => {
  it("rounds bpm values and rejects implausible ones", () => {
    expect(normalizeBpm("127.5 BPM")).toBe("128");
    expect(normalizeBpm("174")).toBe("174");
    expect(normalizeBpm("5")).toBeUndefined();
    expect(normalizeBpm("abc")).toBeUndefined();
  });

  it("pads track numbers", () => {
    expect(extractTrackNumber("7")).toBe("07");
    expect(extractTrackNumber("120")).toBe("120");
    expect(extractTrackNumber("0")).toBeUndefined();
    expect(extractTrackNumber("A1")).toBeUndefined();
  });

  it("finds a four digit year", () => {
    expect(extractYear("released 1998")).toBe("1998");
    expect(extractYear("n/a")).toBeUndefined();
  });

  it("infers and strips mix names", () => {
    expect(inferMix("Lowlight [Aya Remix]")).toBe("Aya Remix");
    expect(inferMix("Lowlight")).toBeUndefined();
    expect(stripMixFromTitle("Lowlight [Aya Remix]", "Aya Remix")).toBe("Lowlight");
    expect(stripMixFromTitle("Lowlight", "Aya Remix")).toBe("Lowlight");
  });
});
