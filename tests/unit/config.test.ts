import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_NETAPP_ADDRESS, loadConfig, loadDotenv } from "../../src/config";
import { ConfigurationError } from "../../src/errors";
import { silentLogger } from "../../src/core/logger";
import { ChannelType } from "../../src/channels/types";
import { createClientFromEnv } from "../../src/index";
import { fakeEncoderFactory } from "../helpers/fake-encoder";
import { LoopbackTransport } from "../helpers/loopback";

describe("loadConfig", () => {
  it("should fall back to defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      url: DEFAULT_NETAPP_ADDRESS,
      connectTimeoutMs: undefined,
      backPressureBytes: undefined,
      debug: false,
      video: { fps: undefined, bitrate: undefined },
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      NETAPP_ADDRESS: " ws://10.0.0.5:5896 ",
      NETAPP_CONNECT_TIMEOUT_MS: "2500",
      NETAPP_BACK_PRESSURE_BYTES: "1048576",
      NETAPP_DEBUG: "TRUE",
      NETAPP_VIDEO_FPS: "15",
      NETAPP_VIDEO_BITRATE: "500000",
    });
    expect(config).toEqual({
      url: "ws://10.0.0.5:5896",
      connectTimeoutMs: 2500,
      backPressureBytes: 1048576,
      debug: true,
      video: { fps: 15, bitrate: 500000 },
    });
  });

  it("should treat anything but 1, true or yes as debug off", () => {
    expect(loadConfig({ NETAPP_DEBUG: "1" }).debug).toBe(true);
    expect(loadConfig({ NETAPP_DEBUG: "yes" }).debug).toBe(true);
    expect(loadConfig({ NETAPP_DEBUG: "off" }).debug).toBe(false);
  });

  it("should reject numbers that are not positive", () => {
    expect(() => loadConfig({ NETAPP_VIDEO_FPS: "fast" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ NETAPP_VIDEO_FPS: "fast" })).toThrow('Invalid NETAPP_VIDEO_FPS: "fast"');
    expect(() => loadConfig({ NETAPP_CONNECT_TIMEOUT_MS: "-1" })).toThrow(ConfigurationError);
  });
});

describe("loadDotenv", () => {
  let dir: string | undefined;

  afterEach(() => {
    delete process.env.NETAPP_DOTENV_PROBE;
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("should load variables from the file", () => {
    dir = mkdtempSync(join(tmpdir(), "netapp-env-"));
    const path = join(dir, ".env");
    writeFileSync(path, "NETAPP_DOTENV_PROBE=from-file\n");

    expect(loadDotenv(path)).toBe(true);
    expect(process.env.NETAPP_DOTENV_PROBE).toBe("from-file");
  });

  it("should report a missing file", () => {
    dir = mkdtempSync(join(tmpdir(), "netapp-env-"));
    expect(loadDotenv(join(dir, "missing.env"))).toBe(false);
  });
});

describe("createClientFromEnv", () => {
  function recordingClient(overrides: { url?: string }, env: Record<string, string>) {
    const urls: string[] = [];
    const client = createClientFromEnv(
      {
        ...overrides,
        logger: silentLogger,
        transportFactory: (url) => {
          urls.push(url);
          return new LoopbackTransport();
        },
      },
      env
    );
    return { client, urls };
  }

  it("should connect to the address from the environment", async () => {
    const { client, urls } = recordingClient({}, { NETAPP_ADDRESS: "http://from-env:5896" });
    await client.connect();
    expect(urls).toEqual(["ws://from-env:5896"]);
  });

  it("should let explicit settings win over the environment", async () => {
    const { client, urls } = recordingClient({ url: "ws://override:1" }, { NETAPP_ADDRESS: "http://from-env:5896" });
    await client.connect();
    expect(urls).toEqual(["ws://override:1"]);
  });

  it("should surface invalid variables", () => {
    expect(() => recordingClient({}, { NETAPP_VIDEO_FPS: "fast" })).toThrow(ConfigurationError);
  });

  it("should stream H264 with default encoder settings when the environment sets none", async () => {
    const { factory, instances } = fakeEncoderFactory();
    const transports: LoopbackTransport[] = [];
    const client = createClientFromEnv(
      {
        logger: silentLogger,
        video: { backend: factory },
        transportFactory: () => {
          const transport = new LoopbackTransport();
          transports.push(transport);
          return transport;
        },
      },
      {}
    );
    await client.connect();
    client.sendImage({ data: new Uint8Array(4 * 4 * 4), width: 4, height: 4, format: "rgba" }, "image", ChannelType.H264, 0);

    expect(instances[0]?.options).toMatchObject({ width: 4, height: 4, fps: 30, bitrate: 2_000_000 });
    expect(transports[0]?.sentEnvelopes().map((envelope) => [envelope.channel, envelope.type, envelope.timestamp])).toEqual([
      ["image", "h264", 0],
    ]);
  });

  it("should pass the environment's encoder settings through", async () => {
    const { factory, instances } = fakeEncoderFactory();
    const client = createClientFromEnv(
      { logger: silentLogger, video: { backend: factory }, transportFactory: () => new LoopbackTransport() },
      { NETAPP_VIDEO_FPS: "15", NETAPP_VIDEO_BITRATE: "500000" }
    );
    await client.connect();
    client.sendImage({ data: new Uint8Array(4 * 4 * 4), width: 4, height: 4, format: "rgba" }, "image", ChannelType.H264, 0);

    expect(instances[0]?.options).toMatchObject({ fps: 15, bitrate: 500_000 });
  });
});
