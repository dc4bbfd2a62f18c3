import { config as loadEnvFile } from "dotenv";
import { ConfigurationError } from "./errors";

export const DEFAULT_NETAPP_ADDRESS = "http://localhost:5896";

/**
 * Client settings read from the environment.
 */
export interface EnvConfig {
  url: string;
  connectTimeoutMs?: number;
  backPressureBytes?: number;
  debug: boolean;
  video: {
    fps?: number;
    bitrate?: number;
  };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Invalid ${name}: "${raw}"`, { variable: name });
  }
  return value;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * NETAPP_ADDRESS, NETAPP_CONNECT_TIMEOUT_MS, NETAPP_BACK_PRESSURE_BYTES,
 * NETAPP_DEBUG, NETAPP_VIDEO_FPS, NETAPP_VIDEO_BITRATE
 */
export function loadConfig(env: Env = process.env): EnvConfig {
  return {
    url: env.NETAPP_ADDRESS?.trim() || DEFAULT_NETAPP_ADDRESS,
    connectTimeoutMs: readNumber(env, "NETAPP_CONNECT_TIMEOUT_MS"),
    backPressureBytes: readNumber(env, "NETAPP_BACK_PRESSURE_BYTES"),
    debug: readFlag(env, "NETAPP_DEBUG"),
    video: {
      fps: readNumber(env, "NETAPP_VIDEO_FPS"),
      bitrate: readNumber(env, "NETAPP_VIDEO_BITRATE"),
    },
  };
}

/**
 * Load a `.env` file into `process.env`. Variables already set win.
 * Returns false when the file does not exist.
 */
export function loadDotenv(path?: string): boolean {
  const result = loadEnvFile(path ? { path } : undefined);
  if (!result.error) {
    return true;
  }
  if ("code" in result.error && result.error.code === "ENOENT") {
    return false;
  }
  throw new ConfigurationError(`Failed to load ${path ?? ".env"}: ${result.error.message}`);
}
