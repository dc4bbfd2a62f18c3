import type { PixelFormat } from "../../channels/types";
import { silentLogger, type Logger } from "../../core/logger";
import { ConfigurationError, SDKError } from "../../errors";
import { bytesPerPixel } from "../../utils/pixels";
import { StderrTail, spawnFfmpeg, type FfmpegProcess, type SpawnFfmpeg } from "../ffmpeg-process";
import type { CaptureSource, Frame } from "../types";

export interface FfmpegSourceOptions {
  /** File path, URL or device (e.g. `/dev/video0`) */
  input: string;
  /** ffmpeg demuxer for the input, e.g. `v4l2` for a camera */
  inputFormat?: string;
  width: number;
  height: number;
  fps: number;
  format?: PixelFormat;
  /**
   * Live inputs are stamped with the wall clock when a frame arrives;
   * files are stamped with their media time.
   */
  live?: boolean;
  ffmpegPath?: string;
  logger?: Logger;
  spawnProcess?: SpawnFfmpeg;
}

/** Decoded frames held before ffmpeg's stdout is paused */
const MAX_BUFFERED_FRAMES = 4;

export function ffmpegSourceArgs(options: FfmpegSourceOptions): string[] {
  return [
    "-hide_banner",
    "-loglevel", "error",
    ...(options.inputFormat ? ["-f", options.inputFormat] : []),
    "-i", options.input,
    "-an",
    "-vf", `scale=${options.width}:${options.height}`,
    "-r", String(options.fps),
    "-f", "rawvideo",
    "-pix_fmt", options.format ?? "rgba",
    "pipe:1",
  ];
}

type Waiter = {
  resolve: (frame: Frame | null) => void;
  reject: (error: Error) => void;
};

/**
 * Frames decoded by an ffmpeg child process from a file or capture device,
 * scaled to a fixed size.
 */
export class FfmpegSource implements CaptureSource {
  readonly fps: number;
  private readonly width: number;
  private readonly height: number;
  private readonly format: PixelFormat;
  private readonly frameBytes: number;
  private readonly live: boolean;
  private readonly logger: Logger;

  private process?: FfmpegProcess;
  private stderr = new StderrTail();
  private partial: Uint8Array[] = [];
  private partialBytes = 0;
  private frames: Frame[] = [];
  private waiters: Waiter[] = [];
  private sequence = 0;
  private ended = false;
  private failure?: Error;

  constructor(options: FfmpegSourceOptions) {
    const { width, height, fps } = options;
    if (!options.input) {
      throw new ConfigurationError("FfmpegSource needs an input");
    }
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
    this.frameBytes = width * height * bytesPerPixel(this.format);
    this.live = options.live ?? false;
    this.logger = (options.logger ?? silentLogger).child("FfmpegSource");

    const command = options.ffmpegPath ?? "ffmpeg";
    const args = ffmpegSourceArgs(options);
    this.logger.debug(`Spawning ${command} ${args.join(" ")}`);
    const child = (options.spawnProcess ?? spawnFfmpeg)(command, args);
    this.process = child;
    this.stderr.attach(child.stderr);

    child.stdout.on("data", (data: Uint8Array) => this.onData(data));
    child.on("error", (error) => {
      this.finish(new SDKError(`Failed to run ${command}: ${error.message}`, "CAPTURE_FAILED", {}, { cause: error }));
    });
    child.on("close", (code) => {
      this.process = undefined;
      if (code !== 0 && code !== null) {
        this.finish(
          new SDKError(`ffmpeg exited with code ${code}${this.stderr.describe()}`, "CAPTURE_FAILED", {
            exitCode: code,
            stderr: this.stderr.recent,
          })
        );
        return;
      }
      if (this.partialBytes > 0) {
        this.logger.warn(`Discarding ${this.partialBytes} bytes of an incomplete frame`);
      }
      this.finish();
    });
  }

  nextFrame(): Promise<Frame | null> {
    const frame = this.frames.shift();
    if (frame) {
      this.process?.stdout.resume();
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    const child = this.process;
    this.process = undefined;
    child?.kill();
    this.frames = [];
    this.finish();
  }

  private onData(data: Uint8Array): void {
    let offset = 0;
    while (offset < data.length) {
      const take = Math.min(this.frameBytes - this.partialBytes, data.length - offset);
      this.partial.push(data.subarray(offset, offset + take));
      this.partialBytes += take;
      offset += take;
      if (this.partialBytes === this.frameBytes) {
        this.emitFrame(Buffer.concat(this.partial, this.frameBytes));
        this.partial = [];
        this.partialBytes = 0;
      }
    }
    if (this.frames.length > MAX_BUFFERED_FRAMES) {
      this.process?.stdout.pause();
    }
  }

  private emitFrame(buffer: Buffer): void {
    const sequenceNumber = this.sequence++;
    const frame: Frame = {
      data: new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength),
      width: this.width,
      height: this.height,
      format: this.format,
      captureTimestamp: this.live ? Date.now() : (sequenceNumber * 1000) / this.fps,
      sequenceNumber,
    };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private finish(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve(null);
      }
    }
  }
}
