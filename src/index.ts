import { NetAppClient, type NetAppClientConfig, type VideoOptions } from "./client/client";
import { loadConfig } from "./config";

export type ClientConfig = NetAppClientConfig;

export function createClient(config: ClientConfig): NetAppClient {
  return new NetAppClient(config);
}

/**
 * Client for the NetApp named by `NETAPP_ADDRESS`. Explicit `overrides` win
 * over the environment.
 */
export function createClientFromEnv(
  overrides: Partial<ClientConfig> = {},
  env: Record<string, string | undefined> = process.env
): NetAppClient {
  const fromEnv = loadConfig(env);
  const video: VideoOptions = {};
  if (fromEnv.video.fps !== undefined) video.fps = fromEnv.video.fps;
  if (fromEnv.video.bitrate !== undefined) video.bitrate = fromEnv.video.bitrate;

  return new NetAppClient({
    url: fromEnv.url,
    connectTimeoutMs: fromEnv.connectTimeoutMs,
    backPressureBytes: fromEnv.backPressureBytes,
    debug: fromEnv.debug,
    ...overrides,
    video: { ...video, ...overrides.video },
  });
}

// Re-exports
export { NetAppClient, toWebSocketUrl } from "./client/client";
export type { ClientStats, ConnectOptions, SendDataOptions, VideoOptions } from "./client/client";
export { loadConfig, loadDotenv, DEFAULT_NETAPP_ADDRESS } from "./config";
export type { EnvConfig } from "./config";
export { WSClient } from "./core/ws";
export type { WSClientConfig } from "./core/ws";
export { ConsoleLogger, silentLogger } from "./core/logger";
export type { Logger } from "./core/logger";
export { ConnectRetryPolicy } from "./core/transport";
export type { IMessageTransport, IRetryPolicy, TransportFactory } from "./core/interfaces";
export { ChannelMultiplexer, DEFAULT_BACK_PRESSURE_BYTES } from "./channels/multiplexer";
export type { ChannelMultiplexerOptions, SendOptions } from "./channels/multiplexer";
export { CodecRegistry, createDefaultRegistry } from "./channels/registry";
export { JsonCodec, JsonLz4Codec, JpegCodec, H264Codec, H264DecoderContext } from "./channels/codecs";
export type { ChannelCodec, DecoderContext } from "./channels/codecs";
export { CONTROL_CHANNEL, ControlCommandType } from "./channels/control";
export type { ControlCommand, ControlReply } from "./channels/control";
export { ChannelType, callbackInfo } from "./channels/types";
export type {
  CallbackInfo,
  Channel,
  ChannelHandler,
  ChannelStats,
  EncodeOptions,
  H264Packet,
  JsonValue,
  MessageMetadata,
  PixelFormat,
  RawEnvelope,
  RawImage,
} from "./channels/types";
export { EncodePipeline, resolveEncoderOptions } from "./video/pipeline";
export { FfmpegH264Encoder, ffmpegEncoderBackend } from "./video/ffmpeg-encoder";
export { SyntheticSource, FfmpegSource } from "./video/sources";
export type { SyntheticSourceOptions, FfmpegSourceOptions } from "./video/sources";
export { StreamSender } from "./video/stream-sender";
export type { ImageSender, StreamResult, StreamSenderOptions } from "./video/stream-sender";
export type {
  CaptureSource,
  EncodedChunk,
  EncoderBackend,
  EncoderBackendFactory,
  Frame,
  PipelineState,
  PipelineStats,
  VideoEncoderOptions,
} from "./video/types";
export {
  SDKError,
  ConfigurationError,
  EncodingMismatchError,
  CodecError,
  UnknownChannelError,
  DuplicateChannelError,
  NotConnectedError,
  AlreadyConnectedError,
  ConnectionError,
  TimeoutError,
  PipelineStoppedError,
  BackPressureError,
  RemoteError,
  ControlCommandError,
} from "./errors";
