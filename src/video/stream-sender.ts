import { ChannelType, type EncodeOptions, type MessageMetadata, type RawImage } from "../channels/types";
import { silentLogger, type Logger } from "../core/logger";
import { SDKError } from "../errors";
import type { CaptureSource, Frame } from "./types";

/**
 * Anything that can put an image on a channel; `NetAppClient` is one.
 */
export interface ImageSender {
  sendImage(
    image: RawImage,
    channelName: string,
    channelType: ChannelType,
    timestamp?: number,
    encoding?: EncodeOptions,
    metadata?: MessageMetadata
  ): void;
}

export interface StreamSenderOptions {
  channel: string;
  /** H264 (default) or JPEG */
  channelType?: ChannelType;
  /** Hold each frame until its slot at the source frame rate */
  pace?: boolean;
  encoding?: EncodeOptions;
  logger?: Logger;
}

export interface StreamResult {
  framesSent: number;
  stoppedBy: "end" | "stop" | "error";
  error?: SDKError;
}

/**
 * Pulls frames from a capture source and sends each one, stamped with its
 * capture timestamp. Runs until the source ends, `stop()` is called or a
 * frame cannot be read or sent; the source is closed in every case.
 */
export class StreamSender {
  private readonly source: CaptureSource;
  private readonly sender: ImageSender;
  private readonly channel: string;
  private readonly channelType: ChannelType;
  private readonly pace: boolean;
  private readonly encoding?: EncodeOptions;
  private readonly logger: Logger;

  private running = false;
  private stopped = false;
  private wake?: () => void;

  constructor(source: CaptureSource, sender: ImageSender, options: StreamSenderOptions) {
    this.source = source;
    this.sender = sender;
    this.channel = options.channel;
    this.channelType = options.channelType ?? ChannelType.H264;
    this.pace = options.pace ?? true;
    this.encoding = options.encoding;
    this.logger = (options.logger ?? silentLogger).child("StreamSender");
  }

  async start(): Promise<StreamResult> {
    if (this.running) {
      throw new SDKError("Stream is already running", "STREAM_RUNNING");
    }
    this.running = true;
    const startedAt = Date.now();
    let framesSent = 0;

    try {
      while (!this.stopped) {
        let frame: Frame | null;
        try {
          frame = await this.source.nextFrame();
        } catch (error) {
          return this.failed(framesSent, SDKError.from(error, "CAPTURE_FAILED"));
        }
        if (!frame) {
          this.logger.debug(`Source ended after ${framesSent} frames`);
          return { framesSent, stoppedBy: "end" };
        }
        if (this.stopped) break;

        if (this.pace) {
          await this.sleep(startedAt + (framesSent * 1000) / this.source.fps - Date.now());
          if (this.stopped) break;
        }

        try {
          this.sender.sendImage(
            frame,
            this.channel,
            this.channelType,
            frame.captureTimestamp,
            this.encoding,
            frame.metadata
          );
        } catch (error) {
          return this.failed(framesSent, SDKError.from(error));
        }
        framesSent++;
      }
      return { framesSent, stoppedBy: "stop" };
    } finally {
      this.running = false;
      this.source.close();
    }
  }

  stop(): void {
    this.stopped = true;
    this.wake?.();
  }

  private failed(framesSent: number, error: SDKError): StreamResult {
    this.logger.error(`Stream on "${this.channel}" stopped after ${framesSent} frames:`, error.message);
    return { framesSent, stoppedBy: "error", error };
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
