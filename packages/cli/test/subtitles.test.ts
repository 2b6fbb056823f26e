import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { cuesToUnits, formatSrt, isSrtPath, loadUnits, parseSrt } from "../src/subtitles.js";

const SRT = [
  "1",
  "00:00:01,000 --> 00:00:02,500",
  "Damn it, what the heck!",
  "",
  "2",
  "00:01:03,250 --> 00:01:04,000",
  "Nothing here",
  "",
  "",
].join("\r\n");

let dir: string;

beforeEach(() => {
  dir = join(tmpdir(), `hushline-srt-test-${randomBytes(4).toString("hex")}`);
  fs.mkdirSync(dir, { recursive: true });
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("isSrtPath", () => {
  it("matches the .srt extension in any case", () => {
    assert.equal(isSrtPath("episode.srt"), true);
    assert.equal(isSrtPath("EPISODE.SRT"), true);
    assert.equal(isSrtPath("units.json"), false);
  });
});

describe("cuesToUnits", () => {
  it("turns cue times into milliseconds", () => {
    assert.deepEqual(cuesToUnits(parseSrt(SRT)), [
      { start: 1000, end: 2500, text: "Damn it, what the heck!" },
      { start: 63250, end: 64000, text: "Nothing here" },
    ]);
  });
});

describe("formatSrt", () => {
  it("keeps ids and times and replaces the text", () => {
    const cues = parseSrt(SRT);
    const reparsed = parseSrt(formatSrt(cues, ["**** it, what the ****!", "Nothing here"]));
    assert.deepEqual(
      reparsed.map((c) => [c.id, c.startTime, c.endTime, c.text]),
      [
        ["1", "00:00:01,000", "00:00:02,500", "**** it, what the ****!"],
        ["2", "00:01:03,250", "00:01:04,000", "Nothing here"],
      ],
    );
  });

  it("rejects a text list of the wrong length", () => {
    assert.throws(() => formatSrt(parseSrt(SRT), ["only one"]), RangeError);
  });
});

describe("loadUnits", () => {
  it("reads SRT files with their cues", () => {
    const file = join(dir, "episode.srt");
    fs.writeFileSync(file, SRT);
    const loaded = loadUnits(file);
    assert.equal(loaded.units.length, 2);
    assert.equal(loaded.cues?.length, 2);
  });

  it("reads JSON units without cues", () => {
    const file = join(dir, "units.json");
    fs.writeFileSync(file, '[{"start": 0, "end": 10, "text": "hi"}]');
    assert.deepEqual(loadUnits(file), { units: [{ start: 0, end: 10, text: "hi" }], cues: null });
  });
});
