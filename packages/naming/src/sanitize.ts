export const MAX_FILENAME_LENGTH = 140;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;
const ILLEGAL_CHARS = /[\\/:"*?<>|]/g;
const EDGE_SEPARATORS = /^[\s.]+|[\s.]+$/g;
const EXTENSION_RE = /\.[A-Za-z0-9]{1,5}$/;

/**
 * Maps arbitrary text to a filename stem that is legal on common
 * filesystems. The same input always yields the same stem.
 */
export function sanitizeStem(text: string, maxLength = MAX_FILENAME_LENGTH): string {
  const limit = Math.max(1, Math.floor(maxLength));
  const cleaned = trimSeparators(
    text
      .normalize("NFKC")
      .replace(CONTROL_CHARS, "")
      .replace(ILLEGAL_CHARS, " ")
      .replace(/\s+/g, " ")
  );

  const codePoints = Array.from(cleaned);
  const truncated = codePoints.length > limit ? trimSeparators(codePoints.slice(0, limit).join("")) : cleaned;
  return truncated.length > 0 ? truncated : "untitled".slice(0, limit);
}

export function sanitizeFilename(name: string, maxLength = MAX_FILENAME_LENGTH): string {
  const { stem, extension } = splitExtension(name);
  const normalizedExtension = extension.toLowerCase();
  return `${sanitizeStem(stem, maxLength - normalizedExtension.length)}${normalizedExtension}`;
}

export function splitExtension(name: string): { stem: string; extension: string } {
  const match = EXTENSION_RE.exec(name);
  if (!match || match.index === 0) {
    return { stem: name, extension: "" };
  }
  return { stem: name.slice(0, match.index), extension: match[0] };
}

function trimSeparators(value: string): string {
  return value.replace(EDGE_SEPARATORS, "");
}
