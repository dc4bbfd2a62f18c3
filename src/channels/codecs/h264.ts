import { CodecError, EncodingMismatchError } from "../../errors";
import { NalUnitType, hasStartCode, nalUnitType, splitNalUnits } from "../../video/annexb";
import { ChannelType, type H264Packet } from "../types";
import type { ChannelCodec, DecoderContext } from "./codec";

/**
 * Tracks what a downstream decoder would need before it can produce pictures.
 * H.264 fragments are not independently decodable, so one context is kept per channel.
 */
export class H264DecoderContext implements DecoderContext<H264Packet> {
  private sawSps = false;
  private sawPps = false;
  private synced = false;

  decode(bytes: Uint8Array): H264Packet {
    const nals = splitNalUnits(bytes);
    if (nals.length === 0) {
      throw new CodecError(ChannelType.H264, "no Annex B start code in fragment");
    }

    const nalTypes: number[] = [];
    for (const nal of nals) {
      if (nal.length === 0 || (nal[0] & 0x80) !== 0) {
        throw new CodecError(ChannelType.H264, "malformed NAL unit header");
      }
      const type = nalUnitType(nal);
      nalTypes.push(type);
      if (type === NalUnitType.SPS) this.sawSps = true;
      if (type === NalUnitType.PPS) this.sawPps = true;
      if (type === NalUnitType.IDR && this.sawSps && this.sawPps) this.synced = true;
    }

    return {
      data: bytes,
      nalTypes,
      keyframe: nalTypes.includes(NalUnitType.IDR),
      decodable: this.synced,
    };
  }
}

/**
 * Raw Annex B fragments, passed through unchanged.
 */
export class H264Codec implements ChannelCodec<H264Packet> {
  readonly type = ChannelType.H264;

  encode(value: unknown): Uint8Array {
    const data = value instanceof Uint8Array ? value : packetData(value);
    if (!data) {
      throw new EncodingMismatchError(this.type, "expected a Uint8Array bitstream fragment");
    }
    if (!hasStartCode(data)) {
      throw new EncodingMismatchError(this.type, "fragment has no Annex B start code");
    }
    return data;
  }

  createDecoder(): DecoderContext<H264Packet> {
    return new H264DecoderContext();
  }
}

function packetData(value: unknown): Uint8Array | undefined {
  if (typeof value === "object" && value !== null && "data" in value && value.data instanceof Uint8Array) {
    return value.data;
  }
  return undefined;
}
