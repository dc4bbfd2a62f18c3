export type { CaptureSource, Frame } from "../types";
export { SyntheticSource, type SyntheticSourceOptions } from "./synthetic";
export { FfmpegSource, ffmpegSourceArgs, type FfmpegSourceOptions } from "./ffmpeg-source";
