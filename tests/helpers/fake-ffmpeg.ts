import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { FfmpegProcess, SpawnFfmpeg } from "../../src/video/ffmpeg-process";

/**
 * Stand-in for an ffmpeg child process. Whatever the code writes to stdin is
 * kept in `written`; the test writes ffmpeg's output to `stdout`/`stderr`
 * and ends it with `exit(code)`.
 */
export class FakeFfmpegProcess extends EventEmitter implements FfmpegProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly written: Uint8Array[] = [];
  killed = false;

  constructor(readonly command: string, readonly args: string[]) {
    super();
    this.stdin.on("data", (chunk: Uint8Array) => this.written.push(chunk));
  }

  kill(): boolean {
    this.killed = true;
    setImmediate(() => this.emit("close", null));
    return true;
  }

  /** Close stdout and report the exit once pending output has been read */
  exit(code: number | null): void {
    this.stdout.end();
    setImmediate(() => this.emit("close", code));
  }

  fail(error: Error): void {
    this.emit("error", error);
  }
}

export function fakeSpawn(onSpawn?: (child: FakeFfmpegProcess) => void): {
  spawn: SpawnFfmpeg;
  processes: FakeFfmpegProcess[];
} {
  const processes: FakeFfmpegProcess[] = [];
  const spawn: SpawnFfmpeg = (command, args) => {
    const child = new FakeFfmpegProcess(command, args);
    processes.push(child);
    onSpawn?.(child);
    return child;
  };
  return { spawn, processes };
}

/** Let pending stream and timer callbacks run */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
