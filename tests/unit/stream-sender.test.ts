import { describe, it, expect } from "vitest";
import { ChannelType, type RawImage } from "../../src/channels/types";
import { SyntheticSource } from "../../src/video/sources";
import { StreamSender, type ImageSender } from "../../src/video/stream-sender";
import type { CaptureSource, Frame } from "../../src/video/types";

class RecordingSender implements ImageSender {
  calls: Array<{ channel: string; type: ChannelType; timestamp?: number; width: number }> = [];
  onSend?: (count: number) => void;

  sendImage(image: RawImage, channelName: string, channelType: ChannelType, timestamp?: number): void {
    this.calls.push({ channel: channelName, type: channelType, timestamp, width: image.width });
    this.onSend?.(this.calls.length);
  }
}

class TrackedSource implements CaptureSource {
  closed = false;
  readonly fps: number;
  private readonly source: CaptureSource;

  constructor(source: CaptureSource) {
    this.source = source;
    this.fps = source.fps;
  }

  nextFrame(): Promise<Frame | null> {
    return this.source.nextFrame();
  }

  close(): void {
    this.closed = true;
    this.source.close();
  }
}

describe("StreamSender", () => {
  it("should send every frame with its capture timestamp until the source ends", async () => {
    const source = new TrackedSource(new SyntheticSource({ width: 4, height: 4, fps: 100, frameCount: 5 }));
    const sender = new RecordingSender();
    const stream = new StreamSender(source, sender, { channel: "image", pace: false });

    const result = await stream.start();

    expect(result).toEqual({ framesSent: 5, stoppedBy: "end" });
    expect(sender.calls.map((call) => call.timestamp)).toEqual([0, 10, 20, 30, 40]);
    expect(sender.calls.every((call) => call.channel === "image" && call.type === ChannelType.H264)).toBe(true);
    expect(source.closed).toBe(true);
  });

  it("should stop at the first send failure and report it", async () => {
    const source = new TrackedSource(new SyntheticSource({ width: 4, height: 4, fps: 30 }));
    const sender = new RecordingSender();
    sender.onSend = (count) => {
      if (count === 3) throw new Error("Not connected to the NetApp");
    };
    const stream = new StreamSender(source, sender, { channel: "image", channelType: ChannelType.JPEG, pace: false });

    const result = await stream.start();

    expect(result.stoppedBy).toBe("error");
    expect(result.framesSent).toBe(2);
    expect(result.error?.message).toBe("Not connected to the NetApp");
    expect(source.closed).toBe(true);
  });

  it("should stop on request", async () => {
    const source = new TrackedSource(new SyntheticSource({ width: 4, height: 4, fps: 30 }));
    const sender = new RecordingSender();
    const stream = new StreamSender(source, sender, { channel: "image", pace: false });
    sender.onSend = (count) => {
      if (count === 2) stream.stop();
    };

    expect(await stream.start()).toEqual({ framesSent: 2, stoppedBy: "stop" });
    expect(source.closed).toBe(true);
  });

  it("should report capture failures", async () => {
    const failing: CaptureSource = {
      fps: 30,
      nextFrame: (): Promise<Frame | null> => Promise.reject(new Error("device unplugged")),
      close: () => {},
    };
    const result = await new StreamSender(failing, new RecordingSender(), { channel: "image" }).start();
    expect(result.stoppedBy).toBe("error");
    expect(result.error?.code).toBe("CAPTURE_FAILED");
  });

  it("should pace frames to the source rate", async () => {
    const source = new SyntheticSource({ width: 2, height: 2, fps: 50, frameCount: 3 });
    const startedAt = Date.now();
    const result = await new StreamSender(source, new RecordingSender(), { channel: "image" }).start();
    expect(result.framesSent).toBe(3);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(35);
  });

  it("should refuse to run twice at once", async () => {
    const source = new SyntheticSource({ width: 2, height: 2, fps: 50, frameCount: 2 });
    const stream = new StreamSender(source, new RecordingSender(), { channel: "image" });
    const first = stream.start();
    await expect(stream.start()).rejects.toThrow("Stream is already running");
    await first;
  });
});
