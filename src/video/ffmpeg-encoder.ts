import { silentLogger, type Logger } from "../core/logger";
import { SDKError } from "../errors";
import { AccessUnitSplitter, NalUnitType, nalUnitType, splitNalUnits } from "./annexb";
import { StderrTail, spawnFfmpeg, type SpawnFfmpeg, type FfmpegProcess } from "./ffmpeg-process";
import type {
  EncoderBackend,
  EncoderBackendFactory,
  EncoderSink,
  Frame,
  ResolvedEncoderOptions,
} from "./types";

export interface FfmpegEncoderConfig {
  /** Defaults to `ffmpeg` on PATH */
  ffmpegPath?: string;
  logger?: Logger;
  spawnProcess?: SpawnFfmpeg;
  /** Frames written but not yet encoded before new frames are refused */
  maxFramesInFlight?: number;
}

export const DEFAULT_MAX_FRAMES_IN_FLIGHT = 8;

/**
 * Command line for libx264 reading raw frames on stdin and writing an Annex B
 * stream on stdout. B-frames are off and every access unit starts with a
 * delimiter, so each output unit is the next input frame.
 */
export function ffmpegEncoderArgs(options: ResolvedEncoderOptions): string[] {
  const realtime = options.latencyMode === "realtime";
  const bitrate = String(options.bitrate);
  return [
    "-hide_banner",
    "-loglevel", "error",
    "-f", "rawvideo",
    "-pix_fmt", options.format,
    "-s", `${options.width}x${options.height}`,
    "-r", String(options.fps),
    "-i", "pipe:0",
    "-an",
    "-c:v", "libx264",
    "-preset", realtime ? "ultrafast" : "medium",
    ...(realtime ? ["-tune", "zerolatency"] : []),
    "-bf", "0",
    "-g", String(options.keyframeInterval),
    "-b:v", bitrate,
    "-maxrate", bitrate,
    "-bufsize", String(options.bitrate * 2),
    "-pix_fmt", "yuv420p",
    "-x264-params", "aud=1:repeat-headers=1",
    "-flush_packets", "1",
    "-f", "h264",
    "pipe:1",
  ];
}

/**
 * H.264 encoder backed by an ffmpeg child process.
 *
 * Forced keyframes are not supported: ffmpeg takes its GOP length once at
 * start (`keyframeInterval`), so the per-frame `keyframe` flag is ignored.
 */
export class FfmpegH264Encoder implements EncoderBackend {
  private readonly options: ResolvedEncoderOptions;
  private readonly ffmpegPath: string;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnFfmpeg;
  private readonly maxFramesInFlight: number;

  private process?: FfmpegProcess;
  private sink?: EncoderSink;
  private splitter = new AccessUnitSplitter();
  private queued: number[] = [];
  private stderr = new StderrTail();
  private closing = false;
  private exited?: Promise<number | null>;

  constructor(options: ResolvedEncoderOptions, config: FfmpegEncoderConfig = {}) {
    this.options = options;
    this.ffmpegPath = config.ffmpegPath ?? "ffmpeg";
    this.logger = (config.logger ?? silentLogger).child("FfmpegH264Encoder");
    this.spawnProcess = config.spawnProcess ?? spawnFfmpeg;
    this.maxFramesInFlight = config.maxFramesInFlight ?? DEFAULT_MAX_FRAMES_IN_FLIGHT;
  }

  start(sink: EncoderSink): void {
    const args = ffmpegEncoderArgs(this.options);
    this.logger.debug(`Spawning ${this.ffmpegPath} ${args.join(" ")}`);
    const child = this.spawnProcess(this.ffmpegPath, args);
    this.process = child;
    this.sink = sink;

    child.stdout.on("data", (data: Uint8Array) => {
      for (const unit of this.splitter.push(data)) {
        this.emitUnit(unit);
      }
    });

    this.stderr.attach(child.stderr);

    child.stdin.on("error", (error: Error) => {
      this.fail(new SDKError(`ffmpeg stdin failed: ${error.message}`, "ENCODER_FAILED", {}, { cause: error }));
    });

    this.exited = new Promise((resolve) => {
      child.on("error", (error) => {
        this.fail(
          new SDKError(`Failed to run ${this.ffmpegPath}: ${error.message}`, "ENCODER_FAILED", {}, { cause: error })
        );
        resolve(null);
      });
      child.on("close", (code) => {
        if (this.process === child) {
          this.process = undefined;
        }
        if (!this.closing && code !== 0) {
          this.fail(this.exitError(code));
        }
        resolve(code);
      });
    });
  }

  encode(frame: Frame, index: number): boolean {
    const child = this.process;
    if (!child) {
      throw new SDKError("ffmpeg encoder is not running", "ENCODER_FAILED");
    }
    if (this.closing) {
      throw new SDKError("ffmpeg encoder is flushing and takes no more frames", "ENCODER_FAILED");
    }
    if (this.queued.length >= this.maxFramesInFlight) {
      this.logger.debug(`ffmpeg is ${this.queued.length} frames behind, refusing frame ${index}`);
      return false;
    }
    this.queued.push(index);
    child.stdin.write(frame.data);
    return true;
  }

  async flush(): Promise<void> {
    const child = this.process;
    const exited = this.exited;
    if (!child || !exited) {
      return;
    }
    this.closing = true;
    child.stdin.end();
    const code = await exited;
    if (code !== 0) {
      throw this.exitError(code);
    }

    const tail = this.splitter.flush();
    if (tail) {
      this.emitUnit(tail);
    }
    if (this.queued.length > 0) {
      this.logger.warn(`ffmpeg produced no output for ${this.queued.length} frames`);
      this.queued = [];
    }
  }

  close(): void {
    this.closing = true;
    this.sink = undefined;
    this.queued = [];
    this.process?.kill();
    this.process = undefined;
  }

  private emitUnit(unit: Uint8Array): void {
    const sink = this.sink;
    if (!sink) return;

    const index = this.queued.shift();
    if (index === undefined) {
      this.fail(new SDKError("ffmpeg produced more access units than frames", "ENCODER_FAILED"));
      return;
    }
    const keyframe = splitNalUnits(unit).some((nal) => nal.length > 0 && nalUnitType(nal) === NalUnitType.IDR);
    sink.onPacket({ data: unit, index, keyframe });
  }

  private fail(error: Error): void {
    const sink = this.sink;
    this.sink = undefined;
    sink?.onError(error);
  }

  private exitError(code: number | null): SDKError {
    return new SDKError(`ffmpeg exited with code ${code}${this.stderr.describe()}`, "ENCODER_FAILED", {
      exitCode: code,
      stderr: this.stderr.recent,
    });
  }
}

/**
 * Backend factory for `EncodePipeline`.
 */
export function ffmpegEncoderBackend(config: FfmpegEncoderConfig = {}): EncoderBackendFactory {
  return (options) => new FfmpegH264Encoder(options, config);
}
