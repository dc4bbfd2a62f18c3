import { Base64Codec } from "../utils/codec";
import { isJsonValue } from "./codecs/json";
import { ChannelType, type MessageMetadata, type RawEnvelope } from "./types";

const CHANNEL_TYPES: ReadonlySet<string> = new Set(Object.values(ChannelType));

export function isChannelType(value: unknown): value is ChannelType {
  return typeof value === "string" && CHANNEL_TYPES.has(value);
}

function isMetadata(value: unknown): value is MessageMetadata {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isJsonValue(value);
}

export function serializeEnvelope(envelope: RawEnvelope): string {
  return JSON.stringify(envelope);
}

export function buildEnvelope(
  channel: string,
  type: ChannelType,
  payload: Uint8Array,
  timestamp: number,
  metadata?: MessageMetadata
): RawEnvelope {
  const envelope: RawEnvelope = {
    channel,
    type,
    data: Base64Codec.encodeBytes(payload),
    timestamp,
  };
  if (metadata !== undefined) {
    envelope.metadata = metadata;
  }
  return envelope;
}

/**
 * Parse and validate an inbound envelope: {channel, type, data, timestamp, metadata?, error?}
 */
export function parseEnvelope(text: string): RawEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error("Invalid envelope: not JSON");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("Invalid envelope: not an object");
  }
  if (!("channel" in parsed) || typeof parsed.channel !== "string" || !parsed.channel) {
    throw new Error("Invalid envelope: missing or invalid channel field");
  }
  if (!("type" in parsed) || !isChannelType(parsed.type)) {
    throw new Error("Invalid envelope: missing or unknown type field");
  }
  if (!("data" in parsed) || typeof parsed.data !== "string" || !Base64Codec.isBase64(parsed.data)) {
    throw new Error("Invalid envelope: missing or invalid data field");
  }
  if (!("timestamp" in parsed) || typeof parsed.timestamp !== "number" || !Number.isFinite(parsed.timestamp)) {
    throw new Error("Invalid envelope: missing or invalid timestamp field");
  }

  const envelope: RawEnvelope = {
    channel: parsed.channel,
    type: parsed.type,
    data: parsed.data,
    timestamp: parsed.timestamp,
  };

  if ("metadata" in parsed && parsed.metadata !== undefined && parsed.metadata !== null) {
    if (!isMetadata(parsed.metadata)) {
      throw new Error("Invalid envelope: metadata must be an object");
    }
    envelope.metadata = parsed.metadata;
  }
  if ("error" in parsed && parsed.error !== undefined && parsed.error !== null) {
    if (typeof parsed.error !== "string") {
      throw new Error("Invalid envelope: error must be a string");
    }
    envelope.error = parsed.error;
  }
  return envelope;
}
