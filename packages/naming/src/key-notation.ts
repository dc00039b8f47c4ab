export type KeyMode = "major" | "minor";

export interface KeyNotation {
  key?: string;
  tonic?: string;
  mode?: KeyMode;
  camelot?: string;
}

interface WheelEntry {
  camelot: string;
  tonic: string;
  mode: KeyMode;
  pitchClass: number;
}

// A = minor, B = major; relative keys share a number.
export const KEY_WHEEL: readonly WheelEntry[] = [
  { camelot: "1A", tonic: "Ab", mode: "minor", pitchClass: 8 },
  { camelot: "1B", tonic: "B", mode: "major", pitchClass: 11 },
  { camelot: "2A", tonic: "Eb", mode: "minor", pitchClass: 3 },
  { camelot: "2B", tonic: "F#", mode: "major", pitchClass: 6 },
  { camelot: "3A", tonic: "Bb", mode: "minor", pitchClass: 10 },
  { camelot: "3B", tonic: "Db", mode: "major", pitchClass: 1 },
  { camelot: "4A", tonic: "F", mode: "minor", pitchClass: 5 },
  { camelot: "4B", tonic: "Ab", mode: "major", pitchClass: 8 },
  { camelot: "5A", tonic: "C", mode: "minor", pitchClass: 0 },
  { camelot: "5B", tonic: "Eb", mode: "major", pitchClass: 3 },
  { camelot: "6A", tonic: "G", mode: "minor", pitchClass: 7 },
  { camelot: "6B", tonic: "Bb", mode: "major", pitchClass: 10 },
  { camelot: "7A", tonic: "D", mode: "minor", pitchClass: 2 },
  { camelot: "7B", tonic: "F", mode: "major", pitchClass: 5 },
  { camelot: "8A", tonic: "A", mode: "minor", pitchClass: 9 },
  { camelot: "8B", tonic: "C", mode: "major", pitchClass: 0 },
  { camelot: "9A", tonic: "E", mode: "minor", pitchClass: 4 },
  { camelot: "9B", tonic: "G", mode: "major", pitchClass: 7 },
  { camelot: "10A", tonic: "B", mode: "minor", pitchClass: 11 },
  { camelot: "10B", tonic: "D", mode: "major", pitchClass: 2 },
  { camelot: "11A", tonic: "F#", mode: "minor", pitchClass: 6 },
  { camelot: "11B", tonic: "A", mode: "major", pitchClass: 9 },
  { camelot: "12A", tonic: "C#", mode: "minor", pitchClass: 1 },
  { camelot: "12B", tonic: "E", mode: "major", pitchClass: 4 }
];

const PITCH_CLASS: Readonly<Record<string, number>> = {
  C: 0,
  "B#": 0,
  "C#": 1,
  Db: 1,
  D: 2,
  "D#": 3,
  Eb: 3,
  E: 4,
  Fb: 4,
  "E#": 5,
  F: 5,
  "F#": 6,
  Gb: 6,
  G: 7,
  "G#": 8,
  Ab: 8,
  A: 9,
  "A#": 10,
  Bb: 10,
  B: 11,
  Cb: 11
};

const WHEEL_CODE_RE = /^0?(1[0-2]|[1-9])\s?([AaBb])$/;
const KEY_NAME_RE = /^([A-Ga-g])([#b]?)\s*(.*)$/;

const MINOR_WORDS = new Set(["m", "min", "minor"]);
const MAJOR_WORDS = new Set(["", "maj", "major"]);

const byCamelot = new Map(KEY_WHEEL.map((entry) => [entry.camelot, entry]));

/**
 * Reads a free-form key ("Fm", "F Minor", "8A", "D♭") into its canonical
 * spelling and wheel code. Unrecognised input yields an empty notation.
 */
export function parseKey(raw: string | undefined): KeyNotation {
  if (!raw) {
    return {};
  }
  const text = raw.replace(/♯/g, "#").replace(/♭/g, "b").replace(/\s+/g, " ").trim();
  if (!text) {
    return {};
  }

  const wheel = WHEEL_CODE_RE.exec(text);
  if (wheel) {
    const entry = byCamelot.get(`${Number(wheel[1])}${wheel[2].toUpperCase()}`);
    return entry ? toNotation(entry) : {};
  }

  const named = KEY_NAME_RE.exec(text);
  if (!named) {
    return {};
  }
  const mode = parseMode(named[3]);
  const pitchClass = PITCH_CLASS[`${named[1].toUpperCase()}${named[2]}`];
  if (!mode || pitchClass === undefined) {
    return {};
  }
  const entry = KEY_WHEEL.find((candidate) => candidate.pitchClass === pitchClass && candidate.mode === mode);
  return entry ? toNotation(entry) : {};
}

export function toCamelot(raw: string | undefined): string | undefined {
  return parseKey(raw).camelot;
}

function parseMode(rest: string): KeyMode | undefined {
  const word = rest.trim().toLowerCase().replace(/\.$/, "");
  if (MINOR_WORDS.has(word)) {
    return "minor";
  }
  if (MAJOR_WORDS.has(word)) {
    return "major";
  }
  return undefined;
}

function toNotation(entry: WheelEntry): KeyNotation {
  return {
    key: entry.mode === "minor" ? `${entry.tonic}m` : entry.tonic,
    tonic: entry.tonic,
    mode: entry.mode,
    camelot: entry.camelot
  };
}
