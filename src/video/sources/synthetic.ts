import type { PixelFormat } from "../../channels/types";
import { ConfigurationError } from "../../errors";
import { bytesPerPixel } from "../../utils/pixels";
import type { CaptureSource, Frame } from "../types";

export interface SyntheticSourceOptions {
  width: number;
  height: number;
  fps: number;
  /** Stop after this many frames; unlimited when omitted */
  frameCount?: number;
  /** Capture timestamp of the first frame, in ms */
  startTimestamp?: number;
  format?: PixelFormat;
}

/**
 * Deterministic moving gradient. Frame `n` is stamped
 * `startTimestamp + n * 1000 / fps` regardless of when it is read.
 */
export class SyntheticSource implements CaptureSource {
  readonly fps: number;
  private readonly width: number;
  private readonly height: number;
  private readonly format: PixelFormat;
  private readonly frameCount: number;
  private readonly startTimestamp: number;
  private sequence = 0;
  private closed = false;

  constructor(options: SyntheticSourceOptions) {
    const { width, height, fps } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new ConfigurationError(`Invalid source size ${width}x${height}`, { width, height });
    }
    if (!(fps > 0)) {
      throw new ConfigurationError(`Invalid source frame rate ${fps}`, { fps });
    }
    this.width = width;
    this.height = height;
    this.fps = fps;
    this.format = options.format ?? "rgba";
    this.frameCount = options.frameCount ?? Infinity;
    this.startTimestamp = options.startTimestamp ?? 0;
  }

  async nextFrame(): Promise<Frame | null> {
    if (this.closed || this.sequence >= this.frameCount) {
      return null;
    }
    const sequenceNumber = this.sequence++;
    return {
      data: this.render(sequenceNumber),
      width: this.width,
      height: this.height,
      format: this.format,
      captureTimestamp: this.startTimestamp + (sequenceNumber * 1000) / this.fps,
      sequenceNumber,
    };
  }

  close(): void {
    this.closed = true;
  }

  private render(sequenceNumber: number): Uint8Array {
    const bpp = bytesPerPixel(this.format);
    const data = new Uint8Array(this.width * this.height * bpp);
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const offset = (y * this.width + x) * bpp;
        data[offset] = (x + sequenceNumber) & 0xff;
        data[offset + 1] = (y + sequenceNumber * 2) & 0xff;
        data[offset + 2] = (sequenceNumber * 3) & 0xff;
        if (bpp === 4) data[offset + 3] = 0xff;
      }
    }
    return data;
  }
}
