import {
  BackPressureError,
  CodecError,
  ConfigurationError,
  DuplicateChannelError,
  EncodingMismatchError,
  NotConnectedError,
  RemoteError,
  UnknownChannelError,
} from "../errors";
import type { IMessageTransport } from "../core/interfaces/IMessageTransport";
import { silentLogger, type Logger } from "../core/logger";
import { Base64Codec } from "../utils/codec";
import { errorMessage, type DecoderContext } from "./codecs/codec";
import { buildEnvelope, parseEnvelope, serializeEnvelope } from "./envelope";
import { InboundQueue } from "./inbound-queue";
import { createDefaultRegistry, type CodecRegistry } from "./registry";
import type {
  Channel,
  ChannelHandler,
  ChannelStats,
  ChannelType,
  EncodeOptions,
  MessageMetadata,
  RawEnvelope,
} from "./types";

export const DEFAULT_BACK_PRESSURE_BYTES = 8 * 1024 * 1024;

export interface ChannelMultiplexerOptions {
  registry?: CodecRegistry;
  logger?: Logger;
  /** Buffered bytes above which droppable messages are refused */
  backPressureBytes?: number;
  /** Wall clock used for default send timestamps */
  now?: () => number;
}

export interface SendOptions {
  /** Send timestamp; defaults to the wall clock, kept non-decreasing */
  timestamp?: number;
  metadata?: MessageMetadata;
  /** Refuse the message with BackPressureError instead of queueing it behind a full buffer */
  canBeDropped?: boolean;
  encoding?: EncodeOptions;
}

/**
 * Carries any number of named, typed channels over one transport.
 *
 * Outbound: `send` encodes with the channel's codec and writes one envelope
 * per transport call. Failures are thrown to the caller and never retried.
 *
 * Inbound: every transport message goes through a single-consumer queue and
 * is dispatched to the handler of its channel. Messages on one channel reach
 * the handler in arrival order. Handlers run on that drain and must not
 * block. A message that cannot be decoded goes to the channel's `onError`;
 * it never reaches the transport.
 */
export class ChannelMultiplexer {
  private readonly registry: CodecRegistry;
  private readonly logger: Logger;
  private readonly backPressureBytes: number;
  private readonly now: () => number;

  private channels = new Map<string, Channel>();
  private decoders = new Map<string, DecoderContext<unknown>>();
  private counters = new Map<string, ChannelStats>();
  private inbound: InboundQueue<string>;
  private transport?: IMessageTransport;
  private unsubscribe?: () => void;
  private lastTimestamp = -Infinity;

  constructor(options: ChannelMultiplexerOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = (options.logger ?? silentLogger).child("ChannelMultiplexer");
    this.backPressureBytes = options.backPressureBytes ?? DEFAULT_BACK_PRESSURE_BYTES;
    this.now = options.now ?? Date.now;

    if (!(this.backPressureBytes > 0)) {
      throw new ConfigurationError(`Invalid value for backPressureBytes: ${this.backPressureBytes}`, {
        backPressureBytes: this.backPressureBytes,
      });
    }

    this.inbound = new InboundQueue(
      (raw) => this.dispatch(raw),
      (error) => this.logger.error("Channel handler threw:", error)
    );
  }

  /**
   * Bind `name` to `type`. Registering the same binding again is a no-op and
   * may attach a handler to a channel that has none yet.
   */
  registerChannel(name: string, type: ChannelType, handler?: ChannelHandler): Channel {
    if (!name) {
      throw new ConfigurationError("Channel name must not be empty");
    }
    if (!this.registry.has(type)) {
      throw new ConfigurationError(`No codec registered for ${type}`, { channel: name, channelType: type });
    }

    const existing = this.channels.get(name);
    if (existing) {
      if (existing.type !== type) {
        throw new DuplicateChannelError(name, existing.type, type);
      }
      if (handler && existing.handler && existing.handler !== handler) {
        throw new DuplicateChannelError(name, existing.type, type);
      }
      if (handler && !existing.handler) {
        existing.handler = handler;
      }
      return existing;
    }

    const channel: Channel = { name, type, handler };
    this.channels.set(name, channel);
    this.decoders.set(name, this.registry.createDecoder(type));
    this.counters.set(name, { sent: 0, received: 0, failed: 0 });
    this.logger.debug(`Registered channel "${name}" (${type})`);
    return channel;
  }

  getChannel(name: string): Channel | undefined {
    return this.channels.get(name);
  }

  /**
   * Start routing inbound messages of `transport` and writing to it.
   */
  attach(transport: IMessageTransport): void {
    this.detach();
    this.transport = transport;
    this.unsubscribe = transport.onMessage((raw) => this.onMessage(raw));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.transport = undefined;
  }

  /**
   * Drop every channel and its decoder state; used when the connection ends.
   */
  reset(): void {
    this.detach();
    this.inbound.clear();
    this.channels.clear();
    this.decoders.clear();
    this.counters.clear();
  }

  send(name: string, value: unknown, options: SendOptions = {}): void {
    const channel = this.channels.get(name);
    if (!channel) {
      throw new UnknownChannelError(name);
    }
    const transport = this.transport;
    if (!transport || !transport.isConnected()) {
      throw new NotConnectedError();
    }

    const counters = this.countersFor(name);
    try {
      if (options.canBeDropped && transport.bufferedAmount > this.backPressureBytes) {
        throw new BackPressureError(name, transport.bufferedAmount, this.backPressureBytes);
      }

      const payload = this.registry.encode(channel.type, value, options.encoding);
      if (options.timestamp !== undefined && !Number.isFinite(options.timestamp)) {
        throw new EncodingMismatchError(channel.type, `timestamp must be a finite number, got ${options.timestamp}`);
      }
      const timestamp = options.timestamp ?? this.nextTimestamp();
      const envelope = buildEnvelope(name, channel.type, payload, timestamp, options.metadata);
      transport.send(serializeEnvelope(envelope));
    } catch (error) {
      counters.failed++;
      throw error;
    }
    counters.sent++;
  }

  /**
   * Entry point for the transport; every inbound message passes through here.
   */
  onMessage(raw: string): void {
    this.inbound.push(raw);
  }

  stats(): Record<string, ChannelStats> {
    const result: Record<string, ChannelStats> = {};
    for (const [name, counters] of this.counters) {
      result[name] = { ...counters };
    }
    return result;
  }

  private dispatch(raw: string): void {
    let envelope: RawEnvelope;
    try {
      envelope = parseEnvelope(raw);
    } catch (error) {
      this.logger.warn(`Dropping malformed message: ${errorMessage(error)}`);
      return;
    }

    const channel = this.channels.get(envelope.channel);
    const decoder = this.decoders.get(envelope.channel);
    if (!channel || !decoder) {
      // May legitimately arrive before the channel is registered locally.
      this.logger.debug(`Dropping message for unknown channel "${envelope.channel}"`);
      return;
    }

    const payload = Base64Codec.decodeBytes(envelope.data);
    if (envelope.error !== undefined) {
      this.fail(channel, payload, new RemoteError(channel.name, envelope.error));
      return;
    }
    if (envelope.type !== channel.type) {
      this.fail(channel, payload, new CodecError(channel.type, `message is typed ${envelope.type}`));
      return;
    }

    let value: unknown;
    try {
      value = decoder.decode(payload);
    } catch (error) {
      this.fail(
        channel,
        payload,
        error instanceof CodecError ? error : new CodecError(channel.type, errorMessage(error), error)
      );
      return;
    }

    this.countersFor(channel.name).received++;
    if (!channel.handler) {
      this.logger.debug(`No handler on channel "${channel.name}", message dropped`);
      return;
    }
    channel.handler.onValue(value, envelope.timestamp, envelope.metadata);
  }

  private fail(channel: Channel, payload: Uint8Array, reason: Error): void {
    this.countersFor(channel.name).failed++;
    if (channel.handler?.onError) {
      channel.handler.onError(payload, reason);
      return;
    }
    this.logger.warn(`Dropping message on "${channel.name}": ${reason.message}`);
  }

  private countersFor(name: string): ChannelStats {
    let counters = this.counters.get(name);
    if (!counters) {
      counters = { sent: 0, received: 0, failed: 0 };
      this.counters.set(name, counters);
    }
    return counters;
  }

  private nextTimestamp(): number {
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp);
    return this.lastTimestamp;
  }
}
