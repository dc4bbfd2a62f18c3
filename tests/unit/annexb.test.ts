import { describe, it, expect } from "vitest";
import { AccessUnitSplitter, findStartCodes, nalUnitType, splitNalUnits } from "../../src/video/annexb";

const aud = [0, 0, 0, 1, 0x09, 0xf0];
const idr = [0, 0, 0, 1, 0x65, 0x88, 0x84];
const slice = [0, 0, 1, 0x41, 0x9a];

describe("Annex B helpers", () => {
  it("should find three and four byte start codes", () => {
    const data = Uint8Array.from([...idr, ...slice]);
    expect(findStartCodes(data)).toEqual([
      { start: 0, header: 4 },
      { start: 7, header: 10 },
    ]);
  });

  it("should split NAL units without their start codes", () => {
    const nals = splitNalUnits(Uint8Array.from([...aud, ...idr]));
    expect(nals.map((nal) => Array.from(nal))).toEqual([
      [0x09, 0xf0],
      [0x65, 0x88, 0x84],
    ]);
    expect(nals.map(nalUnitType)).toEqual([9, 5]);
  });

  it("should cut access units at delimiters across arbitrary chunk boundaries", () => {
    const stream = Uint8Array.from([...aud, ...idr, ...aud, ...slice, ...aud, ...slice]);
    const splitter = new AccessUnitSplitter();
    const units: number[][] = [];
    for (let i = 0; i < stream.length; i += 3) {
      units.push(...splitter.push(stream.subarray(i, i + 3)).map((unit) => Array.from(unit)));
    }
    const tail = splitter.flush();
    if (tail) units.push(Array.from(tail));

    expect(units).toEqual([
      [...aud, ...idr],
      [...aud, ...slice],
      [...aud, ...slice],
    ]);
    expect(splitter.flush()).toBeNull();
  });
});
