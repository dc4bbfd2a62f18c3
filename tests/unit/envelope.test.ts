import { describe, it, expect } from "vitest";
import { buildEnvelope, parseEnvelope, serializeEnvelope } from "../../src/channels/envelope";
import { ChannelType } from "../../src/channels/types";

describe("Envelope", () => {
  it("should carry channel, type, base64 payload and timestamp", () => {
    const envelope = buildEnvelope("results", ChannelType.JSON, Uint8Array.from([1, 2, 3]), 42.5);
    expect(envelope).toEqual({ channel: "results", type: "json", data: "AQID", timestamp: 42.5 });
    expect(parseEnvelope(serializeEnvelope(envelope))).toEqual(envelope);
  });

  it("should keep metadata and error fields", () => {
    const raw = JSON.stringify({
      channel: "image",
      type: "h264",
      data: "",
      timestamp: 7,
      metadata: { camera: "front" },
      error: "cannot decode",
    });
    expect(parseEnvelope(raw)).toEqual({
      channel: "image",
      type: "h264",
      data: "",
      timestamp: 7,
      metadata: { camera: "front" },
      error: "cannot decode",
    });
  });

  it("should reject malformed envelopes", () => {
    expect(() => parseEnvelope("not json")).toThrow("Invalid envelope: not JSON");
    expect(() => parseEnvelope("[1]")).toThrow("Invalid envelope: not an object");
    expect(() => parseEnvelope('{"type":"json","data":"","timestamp":1}')).toThrow(
      "Invalid envelope: missing or invalid channel field"
    );
    expect(() => parseEnvelope('{"channel":"a","type":"png","data":"","timestamp":1}')).toThrow(
      "Invalid envelope: missing or unknown type field"
    );
    expect(() => parseEnvelope('{"channel":"a","type":"json","data":"%%%","timestamp":1}')).toThrow(
      "Invalid envelope: missing or invalid data field"
    );
    expect(() => parseEnvelope('{"channel":"a","type":"json","data":"","timestamp":"now"}')).toThrow(
      "Invalid envelope: missing or invalid timestamp field"
    );
    expect(() => parseEnvelope('{"channel":"a","type":"json","data":"","timestamp":1,"metadata":[1]}')).toThrow(
      "Invalid envelope: metadata must be an object"
    );
  });
});
