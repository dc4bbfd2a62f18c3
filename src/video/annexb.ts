/**
 * Annex B (start code delimited) H.264 bitstream helpers.
 */

export const NalUnitType = {
  SLICE: 1,
  IDR: 5,
  SEI: 6,
  SPS: 7,
  PPS: 8,
  AUD: 9,
} as const;

/**
 * Offsets of every `00 00 01` start code whose NAL header byte is present.
 * A leading zero of a four byte start code is reported as part of the code.
 */
export function findStartCodes(data: Uint8Array, from: number = 0): Array<{ start: number; header: number }> {
  const found: Array<{ start: number; header: number }> = [];
  for (let i = from; i + 3 < data.length; i++) {
    if (data[i] !== 0 || data[i + 1] !== 0) continue;
    if (data[i + 2] !== 1) continue;
    const start = i > 0 && data[i - 1] === 0 ? i - 1 : i;
    found.push({ start, header: i + 3 });
    i += 2;
  }
  return found;
}

/**
 * NAL unit payloads (without start codes), in stream order.
 */
export function splitNalUnits(data: Uint8Array): Uint8Array[] {
  const codes = findStartCodes(data);
  return codes.map((code, index) => {
    const end = index + 1 < codes.length ? codes[index + 1].start : data.length;
    return data.subarray(code.header, end);
  });
}

export function nalUnitType(nal: Uint8Array): number {
  return nal[0] & 0x1f;
}

export function hasStartCode(data: Uint8Array): boolean {
  return findStartCodes(data).length > 0;
}

/**
 * Cuts a byte stream into access units at access unit delimiters.
 * Input may be split anywhere, including inside a start code.
 */
export class AccessUnitSplitter {
  private pending: Uint8Array = new Uint8Array(0);

  push(chunk: Uint8Array): Uint8Array[] {
    const buffer = new Uint8Array(this.pending.length + chunk.length);
    buffer.set(this.pending, 0);
    buffer.set(chunk, this.pending.length);

    const units: Uint8Array[] = [];
    let unitStart = 0;
    for (const code of findStartCodes(buffer)) {
      if (code.start === unitStart) continue;
      if ((buffer[code.header] & 0x1f) === NalUnitType.AUD) {
        units.push(buffer.slice(unitStart, code.start));
        unitStart = code.start;
      }
    }

    this.pending = buffer.slice(unitStart);
    return units;
  }

  /**
   * Whatever is buffered once the stream has ended.
   */
  flush(): Uint8Array | null {
    if (this.pending.length === 0) {
      return null;
    }
    const unit = this.pending;
    this.pending = new Uint8Array(0);
    return unit;
  }
}
