import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createMatcher, findMatches, scoreWindow, scoreWord, similarity } from "../src/matcher.js";
import type { Term } from "../src/terms.js";

function term(word: string, threshold = 85, aggressive = false): Term {
  return { word, threshold, aggressive };
}

describe("similarity", () => {
  it("is 100 for equal strings and 0 for disjoint ones", () => {
    assert.equal(similarity("damn", "damn"), 100);
    assert.equal(similarity("this", "damn"), 0);
  });

  it("counts a transposition as one delete plus one insert", () => {
    assert.equal(similarity("fcuk", "fuck"), 75);
  });

  it("is not rounded", () => {
    assert.equal(similarity("abcdefghijkxy", "abcdefghijklm"), 2200 / 26);
    assert.equal(similarity("son of a bitcx", "son of a bitch"), 2600 / 28);
  });

  it("is 100 for two empty strings", () => {
    assert.equal(similarity("", ""), 100);
  });

  it("is symmetric", () => {
    assert.equal(similarity("system", "use"), similarity("use", "system"));
    assert.equal(similarity("damnation", "damn"), similarity("damn", "damnation"));
  });
});

describe("scoreWord", () => {
  it("scores exact matches 100", () => {
    assert.equal(scoreWord("damn", "damn", false), 100);
  });

  it("accepts base suffixes in either direction", () => {
    assert.equal(scoreWord("damned", "damn", false), 100);
    assert.equal(scoreWord("damns", "damn", false), 100);
    assert.equal(scoreWord("damnin", "damn", false), 100);
    assert.equal(scoreWord("damn", "damner", false), 100);
  });

  it("accepts aggressive suffixes only in aggressive mode", () => {
    assert.equal(scoreWord("damnful", "damn", true), 100);
    assert.notEqual(scoreWord("damnful", "damn", false), 100);
  });

  it("matches substrings in aggressive mode for targets of 3+ letters", () => {
    assert.equal(scoreWord("misuse", "use", true), 100);
    assert.equal(scoreWord("overdamnedly", "damn", true), 100);
    assert.notEqual(scoreWord("misuse", "use", false), 100);
  });

  it("does not apply substring matching to 2-letter targets", () => {
    // "ab" inside "xaby": no substring shortcut, falls through to similarity
    assert.notEqual(scoreWord("xaby", "ab", true), 100);
  });

  it("penalises a different first letter", () => {
    // "muck" vs "fuck": 75 similarity minus 25
    assert.equal(scoreWord("muck", "fuck", false), 50);
    // same first letter: no penalty
    assert.equal(scoreWord("fcuk", "fuck", false), 75);
  });

  it("does not penalise when one word contains the other", () => {
    // "amn" is inside "damn": plain similarity 600/7
    assert.equal(scoreWord("amn", "damn", false), similarity("amn", "damn"));
  });

  it("floors the penalised score at 0", () => {
    assert.equal(scoreWord("this", "damn", false), 0);
  });
});

describe("scoreWindow", () => {
  it("uses single-word scoring for one-word windows", () => {
    assert.equal(scoreWindow("damned", "damn", false), 100);
  });

  it("uses plain similarity for phrases", () => {
    assert.equal(scoreWindow("son of a gun", "son of a gun", false), 100);
    // no suffix leniency for phrases
    assert.equal(
      scoreWindow("sons of a gun", "son of a gun", false),
      similarity("sons of a gun", "son of a gun"),
    );
  });

  it("scores empty input 0", () => {
    assert.equal(scoreWindow("", "damn", false), 0);
  });
});

describe("findMatches", () => {
  it("finds an exact word", () => {
    const matches = findMatches("This is damn funny", [term("damn")]);
    assert.equal(matches.length, 1);
    assert.equal(matches[0].windowText, "damn");
    assert.equal(matches[0].score, 100);
    assert.equal(matches[0].term.word, "damn");
  });

  it("does not match a longer unrelated derivation", () => {
    assert.deepEqual(findMatches("That damnation is wrong", [term("damn")]), []);
  });

  it("matches an allowed suffix", () => {
    const matches = findMatches("He was damned", [term("damn")]);
    assert.equal(matches.length, 1);
    assert.equal(matches[0].windowText, "damned");
    assert.equal(matches[0].score, 100);
  });

  it("matches compounds and substrings in aggressive mode", () => {
    const matches = findMatches("They misuse the system", [term("use", 85, true)]);
    assert.ok(matches.some((m) => m.windowText === "misuse" && m.score === 100));
  });

  it("matches obfuscated spellings above a looser threshold", () => {
    const matches = findMatches("What the fcuk!", [term("fuck", 70)]);
    assert.deepEqual(
      matches.map((m) => [m.windowText, m.score]),
      [["fcuk", 75]],
    );
  });

  it("never matches a stop-word window", () => {
    assert.deepEqual(findMatches("The the THE", [term("the", 0)]), []);
    assert.deepEqual(findMatches("The end", [term("the", 100)]), []);
  });

  it("matches multi-word phrases over windows of the same size", () => {
    const matches = findMatches("You son of a gun!", [term("son of a gun")]);
    assert.equal(matches.length, 1);
    assert.equal(matches[0].windowText, "son of a gun");
    assert.equal(matches[0].score, 100);
  });

  it("normalizes the term before matching", () => {
    const matches = findMatches("DAMN it", [term("  Dámn! ")]);
    assert.equal(matches.length, 1);
    assert.equal(matches[0].windowText, "damn");
    assert.equal(matches[0].term.word, "  Dámn! ");
  });

  it("skips terms that normalize to nothing", () => {
    assert.deepEqual(findMatches("123 go", [term("123", 0)]), []);
  });

  it("orders by catalog then window position, without deduplication", () => {
    const matches = findMatches("heck damn heck", [term("heck"), term("damn"), term("heck", 50)]);
    assert.deepEqual(
      matches.map((m) => [m.term.word, m.windowText]),
      [
        ["heck", "heck"],
        ["heck", "heck"],
        ["damn", "damn"],
        ["heck", "heck"],
        ["heck", "heck"],
      ],
    );
  });

  it("compares thresholds inclusively", () => {
    assert.equal(findMatches("fcuk", [term("fuck", 75)]).length, 1);
    assert.equal(findMatches("fcuk", [term("fuck", 76)]).length, 0);
  });

  it("does not round a score up to the threshold", () => {
    assert.deepEqual(findMatches("abcdefghijkxy", [term("abcdefghijklm", 85)]), []);
    assert.deepEqual(
      findMatches("abcdefghijkxy", [term("abcdefghijklm", 84)]).map((m) => m.score),
      [2200 / 26],
    );
    assert.deepEqual(findMatches("son of a bitcx", [term("son of a bitch", 93)]), []);
  });

  it("returns nothing for an empty catalog or empty text", () => {
    assert.deepEqual(findMatches("damn", []), []);
    assert.deepEqual(findMatches("", [term("damn")]), []);
  });

  it("gives identical results across runs", () => {
    const matcher = createMatcher([term("damn"), term("heck", 60, true)]);
    const text = "Damn, what the heckin' hell, damned heck";
    assert.deepEqual(matcher.findMatches(text), matcher.findMatches(text));
  });
});
