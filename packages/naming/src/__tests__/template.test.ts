import { describe, expect, it } from "vitest";
import { ValidationError } from "@deckname/core";
import {
  DEFAULT_TEMPLATE,
  expandTemplate,
  findInvalidTokens,
  parseTemplate,
  validateTemplate
} from "../template";
import { sanitizeStem } from "../sanitize";

describe("parseTemplate", () => {
  it("splits literals and tokens", () => {
    expect(parseTemplate("{artist} - {title}")).toEqual([
      { kind: "token", name: "artist" },
      { kind: "literal", text: " - " },
      { kind: "token", name: "title" }
    ]);
  });

  it("keeps unmatched braces as literal text", () => {
    expect(parseTemplate("{artist")).toEqual([{ kind: "literal", text: "{artist" }]);
  });
});

describe("expandTemplate", () => {
  it("renders the default template with every field", () => {
    const name = expandTemplate(DEFAULT_TEMPLATE, {
      artist: "X",
      title: "Y",
      mix: "Extended Mix",
      camelot: "8A",
      bpm: "124"
    });
    expect(name).toBe("X - Y (Extended Mix) [8A 124]");
  });

  it("drops conditional tokens whose fields are missing", () => {
    expect(expandTemplate(DEFAULT_TEMPLATE, { artist: "X", title: "Y" })).toBe("X - Y");
    expect(expandTemplate(DEFAULT_TEMPLATE, { artist: "X", title: "Y", camelot: "8A" })).toBe("X - Y");
  });

  it("renders absent simple fields as empty strings", () => {
    const raw = expandTemplate("{track}. {artist} - {title}", { artist: "X", title: "Y" });
    expect(raw).toBe(". X - Y");
    expect(sanitizeStem(raw)).toBe("X - Y");
  });

  it("rejects unknown tokens", () => {
    expect(() => expandTemplate("{artist} {bogus}", { artist: "X" })).toThrow(ValidationError);
    try {
      expandTemplate("{artist} {bogus}", { artist: "X" });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.invalidTokens).toEqual(["bogus"]);
        expect(error.message).toBe("Unknown template token(s): {bogus}");
      }
    }
  });
});

describe("validateTemplate", () => {
  it("reports unknown tokens without a sample", () => {
    expect(validateTemplate("{artist} - {bogus}")).toEqual({
      valid: false,
      invalidTokens: ["bogus"],
      errors: ["Unknown template token: {bogus}"]
    });
  });

  it("rejects blank templates", () => {
    const result = validateTemplate("   ");
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["Template cannot be empty"]);
  });

  it("expands sample metadata for valid templates", () => {
    const result = validateTemplate(DEFAULT_TEMPLATE);
    expect(result.valid).toBe(true);
    expect(result.sampleExpansion).toBe("Sample Artist - Sample Title (Original Mix) [8A 128]");
  });

  it("lists each unknown token once in order", () => {
    expect(findInvalidTokens("{a}{b}{a}{title}")).toEqual(["a", "b"]);
  });
});
