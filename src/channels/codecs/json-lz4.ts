import { compressBlock, compressBound, decompressBlock } from "lz4js";
import { CodecError } from "../../errors";
import { ChannelType, type JsonValue } from "../types";
import { decodeJson, encodeJson } from "./json";
import { errorMessage, type ChannelCodec, type DecoderContext } from "./codec";

const HEADER_BYTES = 4;
const HASH_TABLE_SIZE = 1 << 16;

export const MAX_DECOMPRESSED_BYTES = 64 * 1024 * 1024;

/**
 * JSON compressed as a single LZ4 block.
 * Layout: uncompressed length (u32, little endian) followed by the block.
 */
export class JsonLz4Codec implements ChannelCodec<JsonValue> {
  readonly type = ChannelType.JSON_LZ4;

  encode(value: unknown): Uint8Array {
    const raw = encodeJson(value, this.type);
    const out = new Uint8Array(HEADER_BYTES + compressBound(raw.length));
    new DataView(out.buffer).setUint32(0, raw.length, true);
    const written = compressBlock(
      raw,
      out.subarray(HEADER_BYTES),
      0,
      raw.length,
      new Uint32Array(HASH_TABLE_SIZE)
    );
    return out.slice(0, HEADER_BYTES + written);
  }

  createDecoder(): DecoderContext<JsonValue> {
    return { decode: (bytes) => this.decode(bytes) };
  }

  private decode(bytes: Uint8Array): JsonValue {
    if (bytes.length <= HEADER_BYTES) {
      throw new CodecError(this.type, `payload too short (${bytes.length} bytes)`);
    }
    const expected = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true);
    if (expected > MAX_DECOMPRESSED_BYTES) {
      throw new CodecError(this.type, `declared size ${expected} exceeds ${MAX_DECOMPRESSED_BYTES} bytes`);
    }

    const block = bytes.subarray(HEADER_BYTES);
    const raw = new Uint8Array(expected);
    let written: number;
    try {
      written = decompressBlock(block, raw, 0, block.length, 0);
    } catch (error) {
      throw new CodecError(this.type, `corrupt LZ4 block: ${errorMessage(error)}`, error);
    }
    if (written !== expected) {
      throw new CodecError(this.type, `LZ4 block inflated to ${written} bytes, expected ${expected}`);
    }
    return decodeJson(raw, this.type);
  }
}
