import type { MessageMetadata, PixelFormat, RawImage } from "../channels/types";

/**
 * One raw picture from a capture source.
 */
export interface Frame extends RawImage {
  /** Capture time in ms; carried through encoding as the correlation timestamp */
  captureTimestamp: number;
  /** Monotonic and gapless within one source */
  sequenceNumber: number;
  /** Passed through to the chunk that represents this frame */
  metadata?: MessageMetadata;
}

/**
 * A piece of H.264 bitstream representing one input frame.
 */
export interface EncodedChunk {
  data: Uint8Array;
  /** Capture timestamp of the frame this chunk represents */
  correlationTimestamp: number;
  /** Sequence number of that frame */
  sequenceNumber: number;
  keyframe: boolean;
  metadata?: MessageMetadata;
}

export type PipelineState = "UNINITIALIZED" | "CONFIGURED" | "STREAMING" | "STOPPED";

export type LatencyMode = "realtime" | "quality";

export interface VideoEncoderOptions {
  width: number;
  height: number;
  fps: number;
  /** Target bitrate in bits per second */
  bitrate?: number;
  latencyMode?: LatencyMode;
  /** Frames between forced keyframes */
  keyframeInterval?: number;
  /** Pixel format of pushed frames */
  format?: PixelFormat;
}

export type ResolvedEncoderOptions = Required<VideoEncoderOptions>;

/**
 * Output of an encoder backend. `index` is the index the backend was given
 * for the input frame this packet represents.
 */
export interface EncodedPacket {
  data: Uint8Array;
  index: number;
  keyframe: boolean;
}

export interface EncoderSink {
  onPacket(packet: EncodedPacket): void;
  onError(error: Error): void;
}

/**
 * The compressing part of the pipeline. Implementations may buffer frames
 * and emit packets later, but every packet carries the index of its frame.
 */
export interface EncoderBackend {
  start(sink: EncoderSink): void;
  /** Returns false when the frame was refused because the encoder is backlogged */
  encode(frame: Frame, index: number, keyframe: boolean): boolean;
  /** Resolves once every accepted frame has been emitted or dropped */
  flush(): Promise<void>;
  close(): void;
}

export type EncoderBackendFactory = (options: ResolvedEncoderOptions) => EncoderBackend;

/**
 * Produces frames until it returns null (end of stream).
 */
export interface CaptureSource {
  readonly fps: number;
  nextFrame(): Promise<Frame | null>;
  close(): void;
}

export interface PipelineStats {
  framesPushed: number;
  chunksEmitted: number;
  /** Frames the encoder accepted but never produced output for */
  framesDropped: number;
  /** Mean ms between a frame entering the pipeline and its chunk leaving it */
  meanLatencyMs: number;
}
