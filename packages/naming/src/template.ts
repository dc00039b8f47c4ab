import { METADATA_FIELDS, ValidationError } from "@deckname/core";
import type { MetadataField, MetadataRecord } from "@deckname/core";
import { sanitizeStem } from "./sanitize";

export const DEFAULT_TEMPLATE = "{artist} - {title}{mix_paren}{kb}";

interface ConditionalToken {
  requires: readonly MetadataField[];
  render: (values: string[]) => string;
}

export const CONDITIONAL_TOKENS: ReadonlyMap<string, ConditionalToken> = new Map<string, ConditionalToken>([
  ["mix_paren", { requires: ["mix"], render: ([mix]) => ` (${mix})` }],
  ["kb", { requires: ["camelot", "bpm"], render: ([camelot, bpm]) => ` [${camelot} ${bpm}]` }]
]);

export const SAMPLE_METADATA: MetadataRecord = Object.freeze({
  artist: "Sample Artist",
  title: "Sample Title",
  album: "Sample Album",
  year: "2024",
  label: "Sample Label",
  bpm: "128",
  key: "Am",
  camelot: "8A",
  mix: "Original Mix",
  track: "01"
});

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "token"; name: string };

export interface TemplateValidation {
  valid: boolean;
  invalidTokens: string[];
  errors: string[];
  sampleExpansion?: string;
}

const TOKEN_RE = /\{([^{}]*)\}/g;
const simpleTokens: ReadonlySet<string> = new Set<string>(METADATA_FIELDS);

export function isKnownToken(name: string): boolean {
  return isMetadataField(name) || CONDITIONAL_TOKENS.has(name);
}

function isMetadataField(name: string): name is MetadataField {
  return simpleTokens.has(name);
}

export function parseTemplate(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;
  for (const match of template.matchAll(TOKEN_RE)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: "literal", text: template.slice(cursor, start) });
    }
    segments.push({ kind: "token", name: match[1] });
    cursor = start + match[0].length;
  }
  if (cursor < template.length) {
    segments.push({ kind: "literal", text: template.slice(cursor) });
  }
  return segments;
}

export function findInvalidTokens(template: string): string[] {
  const invalid: string[] = [];
  for (const segment of parseTemplate(template)) {
    if (segment.kind === "token" && !isKnownToken(segment.name) && !invalid.includes(segment.name)) {
      invalid.push(segment.name);
    }
  }
  return invalid;
}

/**
 * Expands a template against a metadata record. Absent fields render as
 * empty strings, conditional tokens render only when every field they
 * need is present. The output still needs sanitizing.
 */
export function expandTemplate(template: string, record: MetadataRecord): string {
  const invalidTokens = findInvalidTokens(template);
  if (invalidTokens.length > 0) {
    const listed = invalidTokens.map((name) => `{${name}}`).join(", ");
    throw new ValidationError(`Unknown template token(s): ${listed}`, {
      invalidTokens,
      issues: [{ path: "template", message: `Unknown template token(s): ${listed}` }]
    });
  }

  return parseTemplate(template)
    .map((segment) => (segment.kind === "literal" ? segment.text : renderToken(segment.name, record)))
    .join("");
}

export function validateTemplate(template: string): TemplateValidation {
  const errors: string[] = [];
  if (template.trim().length === 0) {
    errors.push("Template cannot be empty");
  }
  const invalidTokens = findInvalidTokens(template);
  for (const name of invalidTokens) {
    errors.push(`Unknown template token: {${name}}`);
  }

  if (errors.length > 0) {
    return { valid: false, invalidTokens, errors };
  }
  return {
    valid: true,
    invalidTokens,
    errors,
    sampleExpansion: sanitizeStem(expandTemplate(template, SAMPLE_METADATA))
  };
}

function renderToken(name: string, record: MetadataRecord): string {
  const conditional = CONDITIONAL_TOKENS.get(name);
  if (conditional) {
    const values = conditional.requires.map((field) => record[field]);
    if (values.some((value) => !value)) {
      return "";
    }
    return conditional.render(values.map((value) => value ?? ""));
  }
  return isMetadataField(name) ? record[name] ?? "" : "";
}
