export type { ChannelCodec, DecoderContext } from "./codec";
export { JsonCodec, isJsonValue } from "./json";
export { JsonLz4Codec } from "./json-lz4";
export { JpegCodec } from "./jpeg";
export { H264Codec, H264DecoderContext } from "./h264";
