import type { ChannelType, EncodeOptions } from "../types";

/**
 * Persistent decoding state for one channel.
 */
export interface DecoderContext<T> {
  decode(bytes: Uint8Array): T;
}

/**
 * Encode/decode pair for one channel type.
 * `encode` throws EncodingMismatchError, decoders throw CodecError.
 */
export interface ChannelCodec<T> {
  readonly type: ChannelType;
  encode(value: unknown, options?: EncodeOptions): Uint8Array;
  createDecoder(): DecoderContext<T>;
}

export const textEncoder = new TextEncoder();

/**
 * Strict UTF-8 decoding; invalid sequences throw instead of becoming U+FFFD.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
