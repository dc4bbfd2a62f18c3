import { ConfigurationError } from "../errors";
import type { ChannelCodec, DecoderContext } from "./codecs/codec";
import { H264Codec } from "./codecs/h264";
import { JpegCodec } from "./codecs/jpeg";
import { JsonCodec } from "./codecs/json";
import { JsonLz4Codec } from "./codecs/json-lz4";
import type { ChannelType, ChannelValue, EncodeOptions } from "./types";

type CodecTable = { [K in ChannelType]?: ChannelCodec<ChannelValue<K>> };

/**
 * Maps channel types to codecs. Built once per client and handed to the
 * multiplexer; nothing here is process-wide.
 */
export class CodecRegistry {
  private codecs: CodecTable = {};

  register<K extends ChannelType>(codec: ChannelCodec<ChannelValue<K>> & { readonly type: K }): this {
    if (this.codecs[codec.type]) {
      throw new ConfigurationError(`A codec for ${codec.type} is already registered`, {
        channelType: codec.type,
      });
    }
    const codecs: { [P in K]?: ChannelCodec<ChannelValue<P>> } = this.codecs;
    codecs[codec.type] = codec;
    return this;
  }

  has(type: ChannelType): boolean {
    return this.codecs[type] !== undefined;
  }

  get<K extends ChannelType>(type: K): ChannelCodec<ChannelValue<K>> {
    const codec = this.codecs[type];
    if (!codec) {
      throw new ConfigurationError(`No codec registered for ${type}`, { channelType: type });
    }
    return codec;
  }

  encode(type: ChannelType, value: unknown, options?: EncodeOptions): Uint8Array {
    return this.get(type).encode(value, options);
  }

  /**
   * One-shot decode with a fresh context. Channels keep their own context
   * through `createDecoder`.
   */
  decode<K extends ChannelType>(type: K, bytes: Uint8Array): ChannelValue<K> {
    return this.createDecoder(type).decode(bytes);
  }

  createDecoder<K extends ChannelType>(type: K): DecoderContext<ChannelValue<K>> {
    return this.get(type).createDecoder();
  }
}

export function createDefaultRegistry(): CodecRegistry {
  return new CodecRegistry()
    .register(new JsonCodec())
    .register(new JsonLz4Codec())
    .register(new JpegCodec())
    .register(new H264Codec());
}
