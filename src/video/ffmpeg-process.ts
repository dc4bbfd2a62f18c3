import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

/**
 * The part of an ffmpeg child process the video classes talk to.
 */
export interface FfmpegProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  on(event: "close", listener: (code: number | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(): boolean;
}

export type SpawnFfmpeg = (command: string, args: string[]) => FfmpegProcess;

export const spawnFfmpeg: SpawnFfmpeg = (command, args) => spawn(command, args);

/**
 * Keeps the last lines ffmpeg wrote to stderr for error messages.
 */
export class StderrTail {
  private lines: string[] = [];
  private readonly limit: number;

  constructor(limit: number = 20) {
    this.limit = limit;
  }

  attach(stream: Readable): void {
    stream.on("data", (data: Uint8Array) => {
      const text = Buffer.from(data).toString("utf-8");
      this.lines.push(...text.split("\n").filter((line) => line.trim()));
      this.lines.splice(0, Math.max(0, this.lines.length - this.limit));
    });
  }

  get recent(): string[] {
    return [...this.lines];
  }

  describe(): string {
    return this.lines.length > 0 ? `: ${this.lines.join(" | ")}` : "";
  }
}
