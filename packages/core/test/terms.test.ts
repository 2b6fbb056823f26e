import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  CatalogFormatError,
  EmptyCatalogError,
  loadCatalogFile,
  parseCatalog,
  parseCatalogEntries,
  requireTerms,
  resolveTerms,
} from "../src/terms.js";

describe("parseCatalogEntries", () => {
  it("tags bare strings and objects", () => {
    const entries = parseCatalogEntries([
      " damn ",
      { word: "heck", threshold: 90, aggressive: true },
    ]);
    assert.deepEqual(entries, [
      { kind: "word", word: "damn" },
      { kind: "structured", word: "heck", aggressive: true, threshold: 90 },
    ]);
  });

  it("drops entries without a usable word", () => {
    const entries = parseCatalogEntries(["", "   ", { word: "  " }, { nope: 1 }, null, 42, []]);
    assert.deepEqual(entries, []);
  });

  it("drops entries with an unusable threshold", () => {
    const entries = parseCatalogEntries([
      { word: "damn", threshold: "abc" },
      { word: "heck", threshold: true },
    ]);
    assert.deepEqual(entries, []);
  });
});

describe("resolveTerms", () => {
  it("applies the default threshold where none is given", () => {
    const terms = resolveTerms(
      [
        { kind: "word", word: "damn" },
        { kind: "structured", word: "heck", aggressive: false },
        { kind: "structured", word: "crap", aggressive: true, threshold: 60 },
      ],
      70,
    );
    assert.deepEqual(terms, [
      { word: "damn", threshold: 70, aggressive: false },
      { word: "heck", threshold: 70, aggressive: false },
      { word: "crap", threshold: 60, aggressive: true },
    ]);
  });
});

describe("parseCatalog", () => {
  it("parses a JSON array of mixed entries", () => {
    const terms = parseCatalog(
      JSON.stringify([
        "damn",
        { word: "heck", threshold: 90, aggressive: true },
        { word: "  " },
        { word: "crap", fuzzy_threshold: "70", variant_strategy: "Aggressive" },
        42,
        { nope: 1 },
      ]),
    );
    assert.deepEqual(terms, [
      { word: "damn", threshold: 85, aggressive: false },
      { word: "heck", threshold: 90, aggressive: true },
      { word: "crap", threshold: 70, aggressive: true },
    ]);
  });

  it("prefers threshold over fuzzy_threshold", () => {
    const terms = parseCatalog('[{"word": "damn", "threshold": 95, "fuzzy_threshold": 50}]');
    assert.equal(terms[0].threshold, 95);
  });

  it("reads the profanities key of an object", () => {
    const terms = parseCatalog('{"profanities": ["damn", {"word": "heck"}]}');
    assert.deepEqual(
      terms.map((t) => t.word),
      ["damn", "heck"],
    );
  });

  it("treats a null profanities list as empty", () => {
    assert.deepEqual(parseCatalog('{"profanities": null}'), []);
  });

  it("rejects JSON that is not a list", () => {
    assert.throws(() => parseCatalog('{"words": ["damn"]}'), CatalogFormatError);
    assert.throws(() => parseCatalog("42"), CatalogFormatError);
  });

  it("falls back to one word per line when the content is not JSON", () => {
    const terms = parseCatalog("# house list\ndamn\n\n  heck  \r\n#skip\nson of a gun\n");
    assert.deepEqual(
      terms.map((t) => t.word),
      ["damn", "heck", "son of a gun"],
    );
    assert.ok(terms.every((t) => t.threshold === 85 && !t.aggressive));
  });

  it("uses the given default threshold", () => {
    assert.equal(parseCatalog('["damn"]', 70)[0].threshold, 70);
  });

  it("gives an empty catalog for blank content", () => {
    assert.deepEqual(parseCatalog(""), []);
    assert.deepEqual(parseCatalog("# only comments\n\n"), []);
  });

  it("keeps duplicate words with different thresholds", () => {
    const terms = parseCatalog('[{"word": "damn", "threshold": 90}, {"word": "damn", "threshold": 60}]');
    assert.equal(terms.length, 2);
  });
});

describe("loadCatalogFile", () => {
  it("reads a catalog from disk", () => {
    const dir = join(tmpdir(), `hushline-terms-${randomBytes(4).toString("hex")}`);
    fs.mkdirSync(dir, { recursive: true });
    const file = join(dir, "terms.txt");
    fs.writeFileSync(file, "damn\nheck\n");
    try {
      const terms = loadCatalogFile(file, 80);
      assert.deepEqual(terms, [
        { word: "damn", threshold: 80, aggressive: false },
        { word: "heck", threshold: 80, aggressive: false },
      ]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("requireTerms", () => {
  it("throws for an empty catalog", () => {
    assert.throws(
      () => requireTerms([], "profanities.json"),
      (err: unknown) =>
        err instanceof EmptyCatalogError &&
        err.message === "No profanities configured in profanities.json",
    );
  });

  it("accepts a non-empty catalog", () => {
    assert.doesNotThrow(() => requireTerms([{ word: "damn", threshold: 85, aggressive: false }]));
  });
});
