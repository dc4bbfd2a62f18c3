import { ChannelType, type MessageMetadata } from "../channels/types";
import { silentLogger, type Logger } from "../core/logger";
import { ConfigurationError, EncodingMismatchError, PipelineStoppedError, SDKError } from "../errors";
import { ffmpegEncoderBackend } from "./ffmpeg-encoder";
import type {
  EncodedChunk,
  EncodedPacket,
  EncoderBackend,
  EncoderBackendFactory,
  Frame,
  PipelineState,
  PipelineStats,
  ResolvedEncoderOptions,
  VideoEncoderOptions,
} from "./types";

/** H.264 level 5.2 limits */
const MAX_FRAME_MACROBLOCKS = 36864;
const MAX_MACROBLOCK_RATE = 2073600;

/** How far behind the newest output a frame may fall before it counts as dropped */
export const REORDER_WINDOW = 16;

export const DEFAULT_VIDEO_BITRATE = 2_000_000;

/**
 * Fill defaults and reject settings no H.264 encoder can honour.
 */
export function resolveEncoderOptions(options: VideoEncoderOptions): ResolvedEncoderOptions {
  const { width, height, fps } = options;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ConfigurationError(`Invalid resolution ${width}x${height}`, { width, height });
  }
  if (width % 2 !== 0 || height % 2 !== 0) {
    throw new ConfigurationError(`H.264 4:2:0 needs even dimensions, got ${width}x${height}`, { width, height });
  }
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new ConfigurationError(`Invalid frame rate ${fps}`, { fps });
  }

  const bitrate = options.bitrate ?? DEFAULT_VIDEO_BITRATE;
  if (!Number.isFinite(bitrate) || bitrate <= 0) {
    throw new ConfigurationError(`Invalid bitrate ${bitrate}`, { bitrate });
  }

  const keyframeInterval = options.keyframeInterval ?? Math.max(1, Math.round(fps * 2));
  if (!Number.isInteger(keyframeInterval) || keyframeInterval < 1) {
    throw new ConfigurationError(`Invalid keyframe interval ${keyframeInterval}`, { keyframeInterval });
  }

  const macroblocks = Math.ceil(width / 16) * Math.ceil(height / 16);
  if (macroblocks > MAX_FRAME_MACROBLOCKS) {
    throw new ConfigurationError(`${width}x${height} exceeds the largest H.264 frame size`, { width, height });
  }
  if (macroblocks * fps > MAX_MACROBLOCK_RATE) {
    throw new ConfigurationError(`${width}x${height} at ${fps} fps exceeds the H.264 macroblock rate`, {
      width,
      height,
      fps,
    });
  }

  return {
    width,
    height,
    fps,
    bitrate,
    keyframeInterval,
    latencyMode: options.latencyMode ?? "realtime",
    format: options.format ?? "rgba",
  };
}

export interface EncodePipelineOptions extends VideoEncoderOptions {
  /** Defaults to an ffmpeg/libx264 child process */
  backend?: EncoderBackendFactory;
  logger?: Logger;
  now?: () => number;
}

export type ChunkHandler = (chunk: EncodedChunk) => void;

type PipelineEventMap = {
  state: PipelineState;
  error: Error;
};

type PipelineEventHandler<T> = (event: T) => void;

interface PendingFrame {
  captureTimestamp: number;
  sequenceNumber: number;
  enteredAt: number;
  metadata?: MessageMetadata;
}

/**
 * Raw frames in, H.264 chunks out.
 *
 * UNINITIALIZED -> CONFIGURED (constructor) -> STREAMING (start) -> STOPPED
 * (stop, abort or an encoder fault). Frames are pushed by the caller; the
 * backend emits packets whenever it is ready, tagged with the index it was
 * given for the frame, and each chunk carries the capture timestamp of
 * that frame. Packets are released in push order whatever order the
 * backend produces them in, so correlation timestamps never go backwards.
 * Nothing is emitted once STOPPED.
 */
export class EncodePipeline {
  private state: PipelineState = "UNINITIALIZED";
  private readonly options: ResolvedEncoderOptions;
  private readonly backend: EncoderBackend;
  private readonly logger: Logger;
  private readonly now: () => number;

  private onChunk?: ChunkHandler;
  private pending = new Map<number, PendingFrame>();
  /** Packets waiting for the frames before them */
  private held = new Map<number, EncodedPacket[]>();
  private lastReleased = -1;
  private releasedFrame?: PendingFrame;
  private nextIndex = 0;
  private keyframeRequested = false;
  private stopping?: Promise<void>;
  private fault?: Error;

  private framesPushed = 0;
  private chunksEmitted = 0;
  private framesDropped = 0;
  private totalLatencyMs = 0;

  private handlers: { [K in keyof PipelineEventMap]: Set<PipelineEventHandler<PipelineEventMap[K]>> } = {
    state: new Set(),
    error: new Set(),
  };

  constructor(options: EncodePipelineOptions) {
    this.options = resolveEncoderOptions(options);
    this.logger = (options.logger ?? silentLogger).child("EncodePipeline");
    this.now = options.now ?? Date.now;
    this.backend = (options.backend ?? ffmpegEncoderBackend({ logger: options.logger }))(this.options);
    this.setState("CONFIGURED");
  }

  get currentState(): PipelineState {
    return this.state;
  }

  get settings(): ResolvedEncoderOptions {
    return { ...this.options };
  }

  on<K extends keyof PipelineEventMap>(event: K, handler: PipelineEventHandler<PipelineEventMap[K]>): () => void {
    this.handlers[event].add(handler);
    return () => {
      this.handlers[event].delete(handler);
    };
  }

  start(onChunk: ChunkHandler): void {
    if (this.state === "STOPPED") {
      throw new PipelineStoppedError(this.fault);
    }
    if (this.state !== "CONFIGURED") {
      throw new ConfigurationError("Encode pipeline is already streaming");
    }

    this.onChunk = onChunk;
    this.backend.start({
      onPacket: (packet) => this.handlePacket(packet),
      onError: (error) => this.abort(error),
    });
    this.setState("STREAMING");
    this.logger.debug(
      `Streaming ${this.options.width}x${this.options.height}@${this.options.fps} at ${this.options.bitrate} bps`
    );
  }

  push(frame: Frame): void {
    if (this.state === "STOPPED" || this.stopping) {
      throw new PipelineStoppedError(this.fault);
    }
    if (this.state !== "STREAMING") {
      throw new ConfigurationError("Encode pipeline has not been started");
    }
    if (
      frame.width !== this.options.width ||
      frame.height !== this.options.height ||
      frame.format !== this.options.format
    ) {
      throw new EncodingMismatchError(
        ChannelType.H264,
        `frame is ${frame.width}x${frame.height} ${frame.format}, pipeline expects ${this.options.width}x${this.options.height} ${this.options.format}`
      );
    }

    const index = this.nextIndex++;
    const keyframe = this.keyframeRequested || index % this.options.keyframeInterval === 0;
    this.keyframeRequested = false;
    this.pending.set(index, {
      captureTimestamp: frame.captureTimestamp,
      sequenceNumber: frame.sequenceNumber,
      enteredAt: this.now(),
      metadata: frame.metadata,
    });
    this.framesPushed++;

    let accepted: boolean;
    try {
      accepted = this.backend.encode(frame, index, keyframe);
    } catch (error) {
      const fault = SDKError.from(error, "ENCODER_FAILED");
      this.abort(fault);
      throw new PipelineStoppedError(fault);
    }
    if (!accepted) {
      this.pending.delete(index);
      this.framesDropped++;
      this.keyframeRequested = this.keyframeRequested || keyframe;
      this.emit(
        "error",
        new SDKError(`Encoder is backlogged, frame ${frame.sequenceNumber} dropped`, "ENCODER_BACKLOG", {
          sequenceNumber: frame.sequenceNumber,
        })
      );
    }
  }

  /**
   * Make the next pushed frame a keyframe.
   */
  requestKeyframe(): void {
    this.keyframeRequested = true;
  }

  /**
   * Stop streaming. With `drain` the encoder is flushed first and its
   * remaining chunks are still emitted. Pushes are refused from the moment
   * this is called.
   */
  stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.state === "STOPPED") {
      return Promise.resolve();
    }
    if (this.stopping) {
      return this.stopping;
    }
    if (this.state !== "STREAMING" || !(options.drain ?? true)) {
      this.abort();
      return Promise.resolve();
    }
    this.stopping = this.drain();
    return this.stopping;
  }

  /**
   * Stop immediately, discarding anything the encoder still holds.
   * With a `fault`, later pushes report it as their cause.
   */
  abort(fault?: Error): void {
    if (this.state === "STOPPED") {
      return;
    }
    if (fault) {
      this.fault = fault;
      this.logger.error("Encoder fault, pipeline stopped:", fault.message);
      this.emit("error", fault);
    }
    this.framesDropped += this.pending.size;
    this.pending.clear();
    this.held.clear();
    this.releasedFrame = undefined;
    this.onChunk = undefined;
    this.setState("STOPPED");
    this.backend.close();
  }

  stats(): PipelineStats {
    return {
      framesPushed: this.framesPushed,
      chunksEmitted: this.chunksEmitted,
      framesDropped: this.framesDropped,
      meanLatencyMs: this.chunksEmitted > 0 ? this.totalLatencyMs / this.chunksEmitted : 0,
    };
  }

  private async drain(): Promise<void> {
    try {
      await this.backend.flush();
    } catch (error) {
      this.abort(SDKError.from(error, "ENCODER_FAILED"));
      return;
    }
    if (this.state === "STREAMING") {
      this.release(true);
      if (this.pending.size > 0) {
        this.logger.warn(`Encoder produced no output for the last ${this.pending.size} frames`);
      }
    }
    this.abort();
  }

  private handlePacket(packet: EncodedPacket): void {
    if (this.state !== "STREAMING" || !this.onChunk) {
      this.logger.debug(`Discarding packet for frame ${packet.index} after stop`);
      return;
    }

    // Another packet for the frame released last.
    if (packet.index === this.lastReleased && this.releasedFrame) {
      this.forward(packet, this.releasedFrame);
      return;
    }
    if (!this.pending.has(packet.index)) {
      const reason =
        packet.index < this.lastReleased
          ? `Encoder emitted frame ${packet.index} after frame ${this.lastReleased}, output discarded`
          : `Encoder emitted output for unknown frame ${packet.index}`;
      this.emit("error", new SDKError(reason, "ENCODER_FAILED"));
      return;
    }

    const packets = this.held.get(packet.index);
    if (packets) {
      packets.push(packet);
    } else {
      this.held.set(packet.index, [packet]);
    }
    this.release(false);
  }

  /**
   * Hand held packets on in index order. A frame with no output is skipped
   * once output REORDER_WINDOW frames past it exists, or on `final`.
   */
  private release(final: boolean): void {
    while (this.held.size > 0 && this.state === "STREAMING") {
      const next = this.lastReleased + 1;
      const packets = this.held.get(next);
      const frame = this.pending.get(next);

      if (packets && frame) {
        this.held.delete(next);
        this.pending.delete(next);
        this.lastReleased = next;
        this.releasedFrame = frame;
        packets.forEach((packet) => this.forward(packet, frame));
        continue;
      }

      if (frame) {
        if (!final && Math.max(...this.held.keys()) - next <= REORDER_WINDOW) {
          return;
        }
        this.pending.delete(next);
        this.framesDropped++;
        this.logger.warn(`Encoder produced no output for frame ${frame.sequenceNumber}, counted as dropped`);
      }
      // Refused by the backend or just dropped.
      this.lastReleased = next;
      this.releasedFrame = undefined;
    }
  }

  private forward(packet: EncodedPacket, frame: PendingFrame): void {
    const onChunk = this.onChunk;
    if (!onChunk) return;

    this.chunksEmitted++;
    this.totalLatencyMs += this.now() - frame.enteredAt;

    const chunk: EncodedChunk = {
      data: packet.data,
      correlationTimestamp: frame.captureTimestamp,
      sequenceNumber: frame.sequenceNumber,
      keyframe: packet.keyframe,
    };
    if (frame.metadata !== undefined) {
      chunk.metadata = frame.metadata;
    }

    try {
      onChunk(chunk);
    } catch (error) {
      this.emit("error", SDKError.from(error));
    }
  }

  private setState(state: PipelineState): void {
    this.state = state;
    this.emit("state", state);
  }

  private emit<K extends keyof PipelineEventMap>(event: K, payload: PipelineEventMap[K]): void {
    this.handlers[event].forEach((handler) => handler(payload));
  }
}
