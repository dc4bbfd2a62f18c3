import { CodecError, EncodingMismatchError } from "../../errors";
import { ChannelType, type JsonValue } from "../types";
import { decodeUtf8, errorMessage, textEncoder, type ChannelCodec, type DecoderContext } from "./codec";

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns why `value` is not plain JSON data, or null when it is.
 */
export function findJsonViolation(value: unknown, path: string = "$", ancestors: Set<object> = new Set()): string | null {
  switch (typeof value) {
    case "string":
    case "boolean":
      return null;
    case "number":
      return Number.isFinite(value) ? null : `${path} is not a finite number`;
    case "object": {
      if (value === null) return null;
      if (ancestors.has(value)) return `${path} is a circular reference`;
      if (!Array.isArray(value) && !isPlainObject(value)) {
        return `${path} is a ${value.constructor?.name ?? "non-plain"} instance`;
      }
      ancestors.add(value);
      try {
        const entries: Array<[string, unknown]> = Array.isArray(value)
          ? value.map((item, index): [string, unknown] => [`${path}[${index}]`, item])
          : Object.entries(value).map(([key, item]): [string, unknown] => [`${path}.${key}`, item]);
        for (const [childPath, child] of entries) {
          const violation = findJsonViolation(child, childPath, ancestors);
          if (violation) return violation;
        }
        return null;
      } finally {
        ancestors.delete(value);
      }
    }
    default:
      return `${path} is ${typeof value}`;
  }
}

export function isJsonValue(value: unknown): value is JsonValue {
  return findJsonViolation(value) === null;
}

export function encodeJson(value: unknown, channelType: string): Uint8Array {
  const violation = findJsonViolation(value);
  if (violation) {
    throw new EncodingMismatchError(channelType, violation);
  }
  return textEncoder.encode(JSON.stringify(value));
}

export function decodeJson(bytes: Uint8Array, channelType: string): JsonValue {
  let text: string;
  try {
    text = decodeUtf8(bytes);
  } catch (error) {
    throw new CodecError(channelType, "payload is not valid UTF-8", error);
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    throw new CodecError(channelType, errorMessage(error), error);
  }
}

export class JsonCodec implements ChannelCodec<JsonValue> {
  readonly type = ChannelType.JSON;

  encode(value: unknown): Uint8Array {
    return encodeJson(value, this.type);
  }

  createDecoder(): DecoderContext<JsonValue> {
    return { decode: (bytes) => decodeJson(bytes, this.type) };
  }
}
