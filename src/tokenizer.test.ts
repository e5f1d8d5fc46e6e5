import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors.js";
import {
  markWordBoundaries,
  retokenizeLine,
  tokenize,
  tokenizePhonetic,
  tokenizeWith,
} from "./tokenizer.js";

describe("markWordBoundaries", () => {
  it("replaces single spaces between words with the marker", () => {
    expect(markWordBoundaries("cat dog", "_")).toBe("cat_dog");
  });

  it("collapses whitespace runs and drops outer whitespace", () => {
    expect(markWordBoundaries("  cat \t  dog  ", "_")).toBe("cat_dog");
  });

  it("returns an empty string for whitespace-only input", () => {
    expect(markWordBoundaries("   ", "_")).toBe("");
  });
});

describe("tokenize (plain)", () => {
  it("splits every character and marks the word gap", () => {
    expect(tokenize("cat dog")).toEqual(["c", "a", "t", "_", "d", "o", "g"]);
  });

  it("returns no tokens for empty text", () => {
    expect(tokenize("")).toEqual([]);
  });

  it("splits IPA clusters and the filler marker into single characters", () => {
    expect(tokenize("tʃ [fp]")).toEqual(["t", "ʃ", "_", "[", "f", "p", "]"]);
  });

  it("keeps characters outside the basic plane whole", () => {
    expect(tokenize("😀a")).toEqual(["😀", "a"]);
  });

  it("uses a custom word boundary marker", () => {
    expect(tokenize("a b", { wordBoundary: "|", clusterPatterns: [] })).toEqual(["a", "|", "b"]);
  });

  it("rejects a boundary marker containing whitespace", () => {
    expect(() => tokenize("a b", { wordBoundary: " ", clusterPatterns: [] })).toThrow(ValidationError);
  });

  it("rejects an empty boundary marker", () => {
    expect(() => tokenize("a b", { wordBoundary: "", clusterPatterns: [] })).toThrow(ValidationError);
  });
});

describe("tokenizePhonetic", () => {
  it("keeps affricates, long segments and the filler marker whole", () => {
    expect(tokenizePhonetic("dʒːa tʃ [fp]")).toEqual(["dʒː", "a", "_", "tʃ", "_", "[fp]"]);
  });

  it("prefers the longer affricate over the short one", () => {
    expect(tokenizePhonetic("tʃːi")).toEqual(["tʃː", "i"]);
    expect(tokenizePhonetic("dzːo")).toEqual(["dzː", "o"]);
  });

  it("emits short affricates as one token", () => {
    expect(tokenizePhonetic("dza")).toEqual(["dz", "a"]);
  });

  it("attaches the length mark to any preceding segment", () => {
    expect(tokenizePhonetic("aːb")).toEqual(["aː", "b"]);
  });

  it("falls back to single characters for everything else", () => {
    expect(tokenizePhonetic("xyz")).toEqual(["x", "y", "z"]);
  });

  it("matches left to right without overlap", () => {
    // "d" + "tʃ": the "d" cannot start "d[zʒ]", so it stands alone
    expect(tokenizePhonetic("dtʃ")).toEqual(["d", "tʃ"]);
  });
});

describe("tokenizeWith", () => {
  it("tries cluster patterns in list order", () => {
    const options = { wordBoundary: "_", clusterPatterns: ["ab", "abc"] };
    expect(tokenizeWith("abc", options)).toEqual(["ab", "c"]);
  });

  it("rejects an invalid cluster pattern", () => {
    expect(() => tokenizeWith("abc", { wordBoundary: "_", clusterPatterns: ["("] })).toThrow(
      ValidationError,
    );
  });
});

describe("retokenizeLine", () => {
  it("re-appends the identifier field unsplit", () => {
    expect(retokenizeLine("cat dog (utt01)")).toBe("c a t _ d o g (utt01)");
  });

  it("normalizes irregular spacing", () => {
    expect(retokenizeLine("  cat   dog  (utt01) ")).toBe("c a t _ d o g (utt01)");
  });

  it("keeps a line that holds only an identifier", () => {
    expect(retokenizeLine("(utt05)")).toBe("(utt05)");
  });

  it("returns an empty string for an empty line", () => {
    expect(retokenizeLine("")).toBe("");
  });

  it("uses phonetic clusters in phonetic mode", () => {
    expect(retokenizeLine("dʒa [fp] (u1)", "phonetic")).toBe("dʒ a _ [fp] (u1)");
  });
});
