// src/config.ts

import crypto from "crypto";
import type { DeviceInfo, MediaProfile, Principal, ServerConfig } from "./types.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_PRINCIPALS, isPrincipalRole } from "./credentials.js";

type Env = Record<string, string | undefined>;

export const DEFAULT_DEVICE_INFO: DeviceInfo = {
  manufacturer: "ONVIF Server",
  model: "Simulated Camera",
  firmwareVersion: "1.0.0",
  serialNumber: "ONVIF-001",
  hardwareId: "HW-001",
};

const DEVICE_INFO_FIELDS: readonly (keyof DeviceInfo)[] = [
  "manufacturer",
  "model",
  "firmwareVersion",
  "serialNumber",
  "hardwareId",
];

export const DEFAULT_PROFILES: readonly MediaProfile[] = [
  {
    token: "Profile_1",
    name: "Main Stream",
    video: { encoding: "H264", width: 1920, height: 1080, framerate: 30, bitrate: 4000 },
    audio: { encoding: "AAC", bitrate: 128, sampleRate: 48000 },
  },
  {
    token: "Profile_2",
    name: "Sub Stream",
    video: { encoding: "H264", width: 640, height: 480, framerate: 15, bitrate: 1000 },
  },
];

function optEnv(env: Env, name: string): string | undefined {
  const v = env[name];
  if (!v || !String(v).trim()) return undefined;
  return String(v);
}

function parseJson(raw: string, name: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigError(`invalid_json_${name}`, { rawPreview: raw.slice(0, 200) });
  }
}

function parseIntOpt(v: string | undefined, def: number): number {
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : def;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * ONVIF_USERS_JSON: { "<username>": { "password": "...", "role": "Administrator" | "User" } }
 */
export function parseUsersJson(raw: string): Principal[] {
  const parsed = parseJson(raw, "ONVIF_USERS_JSON");
  if (!isRecord(parsed)) throw new ConfigError("invalid_users_json_shape");

  const principals: Principal[] = [];
  for (const identifier of Object.keys(parsed)) {
    const entry = parsed[identifier];
    if (!isRecord(entry)) throw new ConfigError("invalid_user_entry", { identifier });

    const password = entry.password;
    if (typeof password !== "string" || !password) {
      throw new ConfigError("user_missing_password", { identifier });
    }

    const role = entry.role ?? "User";
    if (!isPrincipalRole(role)) throw new ConfigError("user_invalid_role", { identifier, role });

    principals.push({ identifier, secret: password, role });
  }

  if (principals.length === 0) throw new ConfigError("no_users_configured");
  return principals;
}

export function parseDeviceInfoJson(raw: string): DeviceInfo {
  const parsed = parseJson(raw, "ONVIF_DEVICE_INFO_JSON");
  if (!isRecord(parsed)) throw new ConfigError("invalid_device_info_json_shape");

  const out: DeviceInfo = { ...DEFAULT_DEVICE_INFO };
  for (const key of DEVICE_INFO_FIELDS) {
    const v = parsed[key];
    if (v === undefined) continue;
    if (typeof v !== "string") throw new ConfigError("invalid_device_info_field", { field: key });
    out[key] = v;
  }
  return out;
}

export function loadServerConfigFromEnv(env: Env = process.env): ServerConfig {
  const host = optEnv(env, "ONVIF_HOST") ?? "0.0.0.0";
  const port = parseIntOpt(optEnv(env, "ONVIF_PORT"), 8000);

  const publicBaseUrl = optEnv(env, "ONVIF_PUBLIC_BASE_URL") ?? `http://localhost:${port}`;
  const rtspBaseUrl = optEnv(env, "ONVIF_RTSP_BASE_URL") ?? "rtsp://localhost:554/stream";
  const maxBody = optEnv(env, "ONVIF_MAX_BODY") ?? "1mb";

  const usersJson = optEnv(env, "ONVIF_USERS_JSON");
  const principals = usersJson ? parseUsersJson(usersJson) : [...DEFAULT_PRINCIPALS];

  const deviceJson = optEnv(env, "ONVIF_DEVICE_INFO_JSON");
  const device = deviceJson ? parseDeviceInfoJson(deviceJson) : { ...DEFAULT_DEVICE_INFO };

  return {
    host,
    port,
    publicBaseUrl,
    rtspBaseUrl,
    maxBody,
    rateLimit: {
      windowSeconds: parseIntOpt(optEnv(env, "ONVIF_RATE_LIMIT_WINDOW_SECONDS"), 60),
      max: parseIntOpt(optEnv(env, "ONVIF_RATE_LIMIT_MAX"), 600),
    },
    principals,
    device,
    profiles: DEFAULT_PROFILES,
  };
}

/** Fingerprint of the non-secret settings, for the boot log. */
export function describeConfig(cfg: ServerConfig): string {
  return crypto
    .createHash("sha256")
    .update(
      JSON.stringify({
        host: cfg.host,
        port: cfg.port,
        publicBaseUrl: cfg.publicBaseUrl,
        rtspBaseUrl: cfg.rtspBaseUrl,
        device: cfg.device,
        users: cfg.principals.map((p) => `${p.identifier}:${p.role}`),
        profiles: cfg.profiles.map((p) => p.token),
      })
    )
    .digest("hex");
}
