/**
 * Encoding of a logical channel. The set is fixed per registry but can be
 * extended by registering more codecs.
 */
export enum ChannelType {
  JSON = "json",
  JSON_LZ4 = "json_lz4",
  H264 = "h264",
  JPEG = "jpeg",
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type PixelFormat = "rgba" | "rgb24";

export interface RawImage {
  data: Uint8Array;
  width: number;
  height: number;
  format: PixelFormat;
}

/**
 * One H.264 bitstream fragment as seen by a channel's decoder context.
 */
export interface H264Packet {
  data: Uint8Array;
  /** NAL unit types found in the fragment, in order */
  nalTypes: number[];
  /** Fragment contains an IDR slice */
  keyframe: boolean;
  /** Parameter sets and an IDR have been seen on this channel */
  decodable: boolean;
}

/**
 * Value types carried by each built-in channel type.
 */
export interface ChannelValueMap {
  [ChannelType.JSON]: JsonValue;
  [ChannelType.JSON_LZ4]: JsonValue;
  [ChannelType.JPEG]: RawImage;
  [ChannelType.H264]: H264Packet;
}

export type ChannelValue<T extends ChannelType> = ChannelValueMap[T];

export type MessageMetadata = JsonObject;

export interface EncodeOptions {
  /** JPEG quality, 1-100 */
  quality?: number;
}

/**
 * Receives decoded values for one channel. Runs on the inbound drain and
 * must return quickly: a slow handler delays every other channel.
 */
export interface ChannelHandler<T = unknown> {
  onValue(value: T, timestamp: number, metadata?: MessageMetadata): void;
  onError?(raw: Uint8Array, reason: Error): void;
}

export interface CallbackInfo<T extends ChannelType = ChannelType> {
  type: T;
  handler: ChannelHandler<ChannelValue<T>>;
}

/**
 * Build callback info from plain functions.
 */
export function callbackInfo<T extends ChannelType>(
  type: T,
  onValue: (value: ChannelValue<T>, timestamp: number, metadata?: MessageMetadata) => void,
  onError?: (raw: Uint8Array, reason: Error) => void
): CallbackInfo<T> {
  return { type, handler: { onValue, onError } };
}

export interface Channel {
  name: string;
  type: ChannelType;
  handler?: ChannelHandler;
}

/**
 * Wire envelope, one per transport message. `data` is the base64 of the
 * encoded payload.
 */
export interface RawEnvelope {
  channel: string;
  type: ChannelType;
  data: string;
  timestamp: number;
  metadata?: MessageMetadata;
  /** Set by the NetApp when it failed to process a message on this channel */
  error?: string;
}

export interface ChannelStats {
  sent: number;
  received: number;
  failed: number;
}
