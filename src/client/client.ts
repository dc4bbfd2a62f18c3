import { CONTROL_CHANNEL, ControlCommandType, controlRequest, parseControlReply } from "../channels/control";
import type { ControlCommand, ControlReply } from "../channels/control";
import { ChannelMultiplexer } from "../channels/multiplexer";
import type { CodecRegistry } from "../channels/registry";
import {
  ChannelType,
  type CallbackInfo,
  type ChannelStats,
  type EncodeOptions,
  type JsonObject,
  type MessageMetadata,
  type RawImage,
} from "../channels/types";
import type { IMessageTransport, TransportFactory } from "../core/interfaces/IMessageTransport";
import type { IRetryPolicy } from "../core/interfaces/IRetryPolicy";
import { ConsoleLogger, type Logger } from "../core/logger";
import { ConnectRetryPolicy } from "../core/transport/ConnectRetryPolicy";
import { WSClient } from "../core/ws";
import {
  AlreadyConnectedError,
  ConfigurationError,
  ConnectionError,
  ControlCommandError,
  EncodingMismatchError,
  NotConnectedError,
  SDKError,
  TimeoutError,
} from "../errors";
import { retryWithBackoff } from "../utils/retry";
import { EncodePipeline } from "../video/pipeline";
import type { EncodedChunk, EncoderBackendFactory, PipelineStats, VideoEncoderOptions } from "../video/types";

export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_CONTROL_TIMEOUT_MS = 10000;
export const DEFAULT_VIDEO_FPS = 30;

export interface VideoOptions extends Partial<VideoEncoderOptions> {
  backend?: EncoderBackendFactory;
}

export interface NetAppClientConfig {
  /** NetApp address; `http(s)://` is turned into `ws(s)://` */
  url: string;
  /** Result channels to listen on, by channel name */
  callbacks?: Record<string, CallbackInfo>;
  /** Buffered bytes above which droppable images are refused */
  backPressureBytes?: number;
  connectTimeoutMs?: number;
  controlTimeoutMs?: number;
  /** Encoder settings for H264 channels; size and format default to the first frame */
  video?: VideoOptions;
  transportFactory?: TransportFactory;
  registry?: CodecRegistry;
  logger?: Logger;
  debug?: boolean;
  /** Called when an encoded chunk could not be sent */
  onSendError?: (channel: string, error: Error) => void;
  /** Called when the NetApp closes the connection */
  onDisconnect?: () => void;
}

export interface ConnectOptions {
  timeoutMs?: number;
  /** Keep retrying while the NetApp is unreachable */
  waitUntilAvailable?: boolean;
  /** Give up waiting after this long; negative waits forever */
  waitTimeoutMs?: number;
  retryPolicy?: IRetryPolicy;
}

export interface SendDataOptions {
  timestamp?: number;
  metadata?: MessageMetadata;
  canBeDropped?: boolean;
}

export interface ClientStats {
  channels: Record<string, ChannelStats>;
  video?: PipelineStats;
}

interface PendingCommand {
  type: ControlCommandType;
  resolve: (reply: ControlReply) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Turn an `http(s)://` or bare `host:port` address into a WebSocket URL.
 */
export function toWebSocketUrl(address: string): string {
  const trimmed = address.trim().replace(/\/$/, "");
  if (!trimmed) {
    throw new ConfigurationError("NetApp address must not be empty");
  }
  if (/^wss?:\/\//.test(trimmed)) {
    return trimmed;
  }
  if (/^https?:\/\//.test(trimmed)) {
    return trimmed.replace(/^http/, "ws");
  }
  return `ws://${trimmed}`;
}

/**
 * Client of one NetApp: a single connection carrying every data, result and
 * control channel, plus the H.264 encoder for video channels.
 */
export class NetAppClient {
  private readonly url: string;
  private readonly logger: Logger;
  private readonly multiplexer: ChannelMultiplexer;
  private readonly transportFactory: TransportFactory;
  private readonly connectTimeoutMs: number;
  private readonly controlTimeoutMs: number;
  private readonly video: VideoOptions;
  private readonly onSendError?: (channel: string, error: Error) => void;
  private readonly onDisconnect?: () => void;

  private callbacks = new Map<string, CallbackInfo>();
  private transport?: IMessageTransport;
  private connecting = false;
  private unsubscribers: Array<() => void> = [];
  private pendingCommands = new Map<string, PendingCommand>();
  private commandCounter = 0;

  private pipeline?: EncodePipeline;
  private videoChannel?: string;
  private videoSequence = 0;

  constructor(config: NetAppClientConfig) {
    this.url = toWebSocketUrl(config.url);
    this.logger = config.logger ?? new ConsoleLogger("NetAppClient", config.debug ?? false);
    this.multiplexer = new ChannelMultiplexer({
      registry: config.registry,
      logger: this.logger,
      backPressureBytes: config.backPressureBytes,
    });
    this.connectTimeoutMs = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.controlTimeoutMs = config.controlTimeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS;
    this.video = config.video ?? {};
    this.onSendError = config.onSendError;
    this.onDisconnect = config.onDisconnect;
    this.transportFactory =
      config.transportFactory ??
      ((url, timeoutMs) => new WSClient({ wsURL: url, timeout: timeoutMs, logger: this.logger }));

    for (const [name, info] of Object.entries(config.callbacks ?? {})) {
      this.registerCallback(name, info);
    }
  }

  /**
   * Open the connection to the NetApp.
   */
  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.transport || this.connecting) {
      throw new AlreadyConnectedError();
    }
    this.connecting = true;

    const timeoutMs = options.timeoutMs ?? this.connectTimeoutMs;
    const open = async (): Promise<IMessageTransport> => {
      const transport = this.transportFactory(this.url, timeoutMs);
      try {
        await transport.connect();
      } catch (error) {
        transport.close();
        throw error;
      }
      return transport;
    };

    try {
      let transport: IMessageTransport;
      if (options.waitUntilAvailable) {
        const policy = options.retryPolicy ?? new ConnectRetryPolicy();
        const waitTimeoutMs = options.waitTimeoutMs ?? -1;
        transport = await retryWithBackoff(open, {
          maxAttempts: policy.getMaxRetries() + 1,
          backoffMs: (attempt) => policy.getDelay(attempt),
          shouldRetry: (error, attempt) => policy.shouldRetry(error, attempt),
          deadline: waitTimeoutMs >= 0 ? Date.now() + waitTimeoutMs : undefined,
          onRetry: (error, attempt, delayMs) => {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.info(`NetApp not available (${reason}), retry ${attempt} in ${delayMs}ms`);
          },
        });
      } else {
        transport = await open();
      }
      this.attach(transport);
      this.logger.info(`Connected to ${this.url}`);
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Connect and initialise the NetApp with a `set_state` command carrying `args`.
   */
  async register(args: JsonObject = {}, options: ConnectOptions = {}): Promise<ControlReply> {
    await this.connect(options);
    return this.sendControlCommand({ type: ControlCommandType.SET_STATE, data: args, clearQueue: true });
  }

  /**
   * Send one image. JPEG images are encoded and sent now. H264 frames go into
   * the encode pipeline and reach the channel when the encoder emits them,
   * stamped with `timestamp`.
   */
  sendImage(
    image: RawImage,
    channelName: string,
    channelType: ChannelType,
    timestamp?: number,
    encoding?: EncodeOptions,
    metadata?: MessageMetadata
  ): void {
    this.ensureChannel(channelName, channelType);

    if (channelType === ChannelType.JPEG) {
      this.multiplexer.send(channelName, image, { timestamp, metadata, encoding, canBeDropped: true });
      return;
    }
    if (channelType !== ChannelType.H264) {
      throw new EncodingMismatchError(channelType, "images are sent on JPEG or H264 channels");
    }
    if (!this.isConnected()) {
      throw new NotConnectedError();
    }

    const pipeline = this.videoPipeline(channelName, image);
    const frame = {
      ...image,
      captureTimestamp: timestamp ?? Date.now(),
      sequenceNumber: this.videoSequence++,
      metadata,
    };
    pipeline.push(frame);
  }

  sendData(
    value: unknown,
    channelName: string,
    channelType: ChannelType = ChannelType.JSON,
    options: SendDataOptions = {}
  ): void {
    this.ensureChannel(channelName, channelType);
    this.multiplexer.send(channelName, value, options);
  }

  /**
   * Send a control command and wait for the NetApp's reply.
   */
  sendControlCommand(command: ControlCommand, options: { timeoutMs?: number } = {}): Promise<ControlReply> {
    if (!this.isConnected()) {
      return Promise.reject(new NotConnectedError());
    }

    const id = `cmd-${++this.commandCounter}`;
    const timeoutMs = options.timeoutMs ?? this.controlTimeoutMs;
    return new Promise<ControlReply>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingCommands.delete(id);
        reject(new TimeoutError(`Control command ${command.type} timed out`, timeoutMs));
      }, timeoutMs);
      this.pendingCommands.set(id, { type: command.type, resolve, reject, timer });

      try {
        this.multiplexer.send(CONTROL_CHANNEL, controlRequest(id, command));
        this.logger.debug(`Sent control command ${command.type} (${id})`);
      } catch (error) {
        clearTimeout(timer);
        this.pendingCommands.delete(id);
        reject(error);
      }
    });
  }

  /**
   * Listen on another result channel.
   */
  registerCallback(name: string, info: CallbackInfo): void {
    this.assertNotReserved(name);
    this.multiplexer.registerChannel(name, info.type, info.handler);
    this.callbacks.set(name, info);
  }

  /** Make the next H264 frame a keyframe, e.g. after the NetApp lost its decoder state. */
  requestKeyframe(): void {
    this.pipeline?.requestKeyframe();
  }

  /**
   * Drain the encoder and send its remaining chunks, then drop the pipeline.
   * The next H264 image starts a new one.
   */
  async stopVideo(): Promise<void> {
    const pipeline = this.pipeline;
    if (!pipeline) return;
    await pipeline.stop({ drain: true });
    if (this.pipeline === pipeline) {
      this.pipeline = undefined;
      this.videoChannel = undefined;
    }
  }

  /**
   * Close the connection. Safe to call when not connected.
   */
  disconnect(): void {
    const transport = this.transport;
    this.teardown();
    if (transport) {
      transport.close();
      this.logger.info("Disconnected");
    }
  }

  isConnected(): boolean {
    return this.transport?.isConnected() ?? false;
  }

  stats(): ClientStats {
    const stats: ClientStats = { channels: this.multiplexer.stats() };
    if (this.pipeline) {
      stats.video = this.pipeline.stats();
    }
    return stats;
  }

  private attach(transport: IMessageTransport): void {
    this.transport = transport;
    this.multiplexer.reset();
    this.multiplexer.registerChannel(CONTROL_CHANNEL, ChannelType.JSON, {
      onValue: (value) => this.handleControlReply(value),
      onError: (_raw, reason) => this.logger.warn(`Control channel error: ${reason.message}`),
    });
    for (const [name, info] of this.callbacks) {
      this.multiplexer.registerChannel(name, info.type, info.handler);
    }
    this.multiplexer.attach(transport);

    this.unsubscribers.push(
      transport.onClose(() => {
        this.logger.warn("Connection closed by the NetApp");
        this.teardown(new ConnectionError("Connection to the NetApp was lost", { url: this.url }));
        this.onDisconnect?.();
      }),
      transport.onError((error) => this.logger.error("Transport error:", error.message))
    );
  }

  private teardown(fault?: SDKError): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    this.transport = undefined;

    this.pipeline?.abort(fault);
    this.pipeline = undefined;
    this.videoChannel = undefined;

    const pending = this.pendingCommands;
    this.pendingCommands = new Map();
    for (const command of pending.values()) {
      clearTimeout(command.timer);
      command.reject(new NotConnectedError("Connection closed before the control command was answered"));
    }

    this.multiplexer.reset();
  }

  private ensureChannel(name: string, type: ChannelType): void {
    this.assertNotReserved(name);
    this.multiplexer.registerChannel(name, type);
  }

  private assertNotReserved(name: string): void {
    if (name === CONTROL_CHANNEL) {
      throw new ConfigurationError(`Channel name "${CONTROL_CHANNEL}" is reserved for control commands`);
    }
  }

  private videoPipeline(channelName: string, image: RawImage): EncodePipeline {
    if (this.pipeline && this.videoChannel !== channelName) {
      throw new ConfigurationError(`Video is already streaming on "${this.videoChannel}"`, {
        channel: channelName,
      });
    }
    if (this.pipeline) {
      return this.pipeline;
    }

    const { backend, ...encoder } = this.video;
    // Unset options fall back to the first frame, never to `undefined`.
    const pipeline = new EncodePipeline({
      ...encoder,
      width: encoder.width ?? image.width,
      height: encoder.height ?? image.height,
      format: encoder.format ?? image.format,
      fps: encoder.fps ?? DEFAULT_VIDEO_FPS,
      backend,
      logger: this.logger,
    });
    pipeline.on("error", (error) => this.reportSendError(channelName, error));
    pipeline.start((chunk) => this.sendChunk(channelName, chunk));

    this.pipeline = pipeline;
    this.videoChannel = channelName;
    return pipeline;
  }

  private sendChunk(channelName: string, chunk: EncodedChunk): void {
    try {
      this.multiplexer.send(channelName, chunk.data, {
        timestamp: chunk.correlationTimestamp,
        metadata: chunk.metadata,
      });
    } catch (error) {
      this.reportSendError(channelName, SDKError.from(error));
    }
  }

  private reportSendError(channelName: string, error: Error): void {
    if (this.onSendError) {
      this.onSendError(channelName, error);
      return;
    }
    this.logger.error(`Failed to send on "${channelName}":`, error.message);
  }

  private handleControlReply(value: unknown): void {
    const reply = parseControlReply(value);
    if (!reply) {
      this.logger.warn("Ignoring malformed control reply");
      return;
    }
    const pending = this.pendingCommands.get(reply.id);
    if (!pending) {
      this.logger.debug(`Ignoring reply to unknown control command ${reply.id}`);
      return;
    }

    this.pendingCommands.delete(reply.id);
    clearTimeout(pending.timer);
    if (reply.success) {
      pending.resolve(reply);
    } else {
      pending.reject(new ControlCommandError(pending.type, reply.message ?? "rejected by the NetApp"));
    }
  }
}
