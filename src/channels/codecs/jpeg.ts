import { decode as decodeJpeg, encode as encodeJpeg } from "jpeg-js";
import { CodecError, EncodingMismatchError } from "../../errors";
import { findImageViolation, isRawImage, toRgba } from "../../utils/pixels";
import { ChannelType, type EncodeOptions, type RawImage } from "../types";
import { errorMessage, type ChannelCodec, type DecoderContext } from "./codec";

export const DEFAULT_JPEG_QUALITY = 80;

/**
 * Still images. Decoded images are always RGBA.
 */
export class JpegCodec implements ChannelCodec<RawImage> {
  readonly type = ChannelType.JPEG;

  encode(value: unknown, options: EncodeOptions = {}): Uint8Array {
    if (!isRawImage(value)) {
      throw new EncodingMismatchError(this.type, findImageViolation(value) ?? "expected an image object");
    }
    const quality = options.quality ?? DEFAULT_JPEG_QUALITY;
    if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
      throw new EncodingMismatchError(this.type, `quality must be an integer in 1..100, got ${quality}`);
    }
    const encoded = encodeJpeg(
      { data: toRgba(value), width: value.width, height: value.height },
      quality
    );
    return new Uint8Array(encoded.data.buffer, encoded.data.byteOffset, encoded.data.byteLength);
  }

  createDecoder(): DecoderContext<RawImage> {
    return { decode: (bytes) => this.decode(bytes) };
  }

  private decode(bytes: Uint8Array): RawImage {
    try {
      const decoded = decodeJpeg(bytes, { useTArray: true, formatAsRGBA: true });
      return { data: decoded.data, width: decoded.width, height: decoded.height, format: "rgba" };
    } catch (error) {
      throw new CodecError(this.type, errorMessage(error), error);
    }
  }
}
