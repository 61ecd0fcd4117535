import { fileURLToPath } from "url";
import path from "path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const LOG_LEVEL =
  process.env.NODE_ENV === "production" ? "info" : "verbose";
export const APP_SERVER_PORT =
  process.env.NODE_ENV === "production" ? 80 : 3000;
export const POLL_INTERVAL = 30000;
export const LONGPOLL_TIMEOUT = 30000;
export const MAX_LONGPOLL_TIMEOUT = 60000;
export const HOMEKIT_PORT = 51826;
export const HOMEKIT_USERNAME = "1A:2B:3C:4D:5E:FF";
export const HOMEKIT_PINCODE = "031-45-154";
export const MANUFACTURER = "Radio Covers";
export const MODEL = "Channel cover";
export const BRIDGE_NAME = "Radio Covers";
export const STORAGE_DIR = process.env.STORAGE_DIR || "persist";
export const COVER_KEY_PREFIX = "cover_";
export const COVERS_CONFIG =
  process.env.COVERS_CONFIG || path.join(__dirname, "../../config/covers.json");

export const DEFAULT_TRAVEL_TIME = 50.0;
export const MIN_CHANNEL = 1;
export const MAX_CHANNEL = 15;

export const COVER_DEVICE_CLASSES = {
  awning: "window",
  "interior shading": "window",
  "roller shutter": "window",
  "rolling door": "garage",
  "venetian blind": "window",
} as const;

export type CoverDeviceClass = keyof typeof COVER_DEVICE_CLASSES;
export type CoverCategory = (typeof COVER_DEVICE_CLASSES)[CoverDeviceClass];

export const COVER_FEATURES = [
  "open",
  "close",
  "stop",
  "set_position",
  "open_tilt",
  "close_tilt",
  "stop_tilt",
  "set_tilt_position",
] as const;

export type CoverFeature = (typeof COVER_FEATURES)[number];

// accepted alongside the canonical names
const FEATURE_ALIASES = new Map<string, CoverFeature>([
  ["up", "open"],
  ["down", "close"],
]);

export interface CoverConfig {
  name: string;
  channel: number;
  deviceClass: string;
  supportedFeatures: string[];
  transmitterSerialNumber: string;
  travelTime: number;
}

export interface TransmitterConfig {
  serialNumber: string;
  // full travel time of the covers a simulated transmitter pretends to drive
  travelTime: number;
}

export interface AppConfig {
  transmitters: TransmitterConfig[];
  covers: CoverConfig[];
}

export function toDeviceClass(value: string): CoverDeviceClass | null {
  const lowered = value.toLowerCase();
  return isDeviceClass(lowered) ? lowered : null;
}

function isDeviceClass(value: string): value is CoverDeviceClass {
  return Object.hasOwn(COVER_DEVICE_CLASSES, value);
}

export function toFeature(value: string): CoverFeature | null {
  const lowered = value.toLowerCase();
  return (
    FEATURE_ALIASES.get(lowered) ??
    COVER_FEATURES.find((feature) => feature === lowered) ??
    null
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Validate one entry of the `covers` section. Every problem found is
 * collected so the operator sees all of them at once.
 */
export function parseCoverConfig(
  key: string,
  raw: unknown
): { config: CoverConfig | null; errors: string[] } {
  const errors: string[] = [];
  if (!isRecord(raw)) {
    return { config: null, errors: [`Cover '${key}' must be an object`] };
  }

  const name = typeof raw.name === "string" ? raw.name : key;

  const channel = toNumber(raw.channel);
  if (
    channel === null ||
    !Number.isInteger(channel) ||
    channel < MIN_CHANNEL ||
    channel > MAX_CHANNEL
  ) {
    errors.push(
      `Cover '${key}': channel must be an integer between ${MIN_CHANNEL} and ${MAX_CHANNEL}`
    );
  }

  const deviceClass =
    typeof raw.device_class === "string" ? raw.device_class : "";
  if (toDeviceClass(deviceClass) === null) {
    errors.push(`Cover '${key}': unsupported device class '${deviceClass}'`);
  }

  const rawFeatures = Array.isArray(raw.supported_features)
    ? raw.supported_features
    : [raw.supported_features];
  const supportedFeatures: string[] = [];
  for (const feature of rawFeatures) {
    if (typeof feature !== "string" || toFeature(feature) === null) {
      errors.push(`Cover '${key}': unsupported feature '${String(feature)}'`);
    } else {
      supportedFeatures.push(feature);
    }
  }

  const transmitterSerialNumber = raw.transmitter_serial_number;
  if (typeof transmitterSerialNumber !== "string" || !transmitterSerialNumber) {
    errors.push(`Cover '${key}': transmitter_serial_number is required`);
  }

  const travelTime =
    raw.travel_time === undefined
      ? DEFAULT_TRAVEL_TIME
      : toNumber(raw.travel_time);
  if (travelTime === null || travelTime <= 0) {
    errors.push(`Cover '${key}': travel_time must be a positive number`);
  }

  if (
    errors.length > 0 ||
    channel === null ||
    travelTime === null ||
    typeof transmitterSerialNumber !== "string"
  ) {
    return { config: null, errors };
  }
  return {
    config: {
      name,
      channel,
      deviceClass,
      supportedFeatures,
      transmitterSerialNumber,
      travelTime,
    },
    errors,
  };
}

export function parseTransmitterConfig(
  index: number,
  raw: unknown
): { config: TransmitterConfig | null; errors: string[] } {
  if (!isRecord(raw) || typeof raw.serial_number !== "string") {
    return {
      config: null,
      errors: [`Transmitter #${index}: serial_number is required`],
    };
  }
  const travelTime =
    raw.travel_time === undefined
      ? DEFAULT_TRAVEL_TIME
      : toNumber(raw.travel_time);
  if (travelTime === null || travelTime <= 0) {
    return {
      config: null,
      errors: [`Transmitter #${index}: travel_time must be a positive number`],
    };
  }
  return {
    config: {
      serialNumber: raw.serial_number,
      travelTime,
    },
    errors: [],
  };
}

export function parseAppConfig(raw: unknown): {
  config: AppConfig;
  errors: string[];
} {
  const config: AppConfig = { transmitters: [], covers: [] };
  const errors: string[] = [];
  if (!isRecord(raw)) {
    return { config, errors: ["Configuration must be a JSON object"] };
  }

  const transmitters = Array.isArray(raw.transmitters) ? raw.transmitters : [];
  transmitters.forEach((entry, index) => {
    const result = parseTransmitterConfig(index, entry);
    errors.push(...result.errors);
    if (result.config) {
      config.transmitters.push(result.config);
    }
  });

  const covers = isRecord(raw.covers) ? raw.covers : {};
  for (const [key, entry] of Object.entries(covers)) {
    const result = parseCoverConfig(key, entry);
    errors.push(...result.errors);
    if (result.config) {
      config.covers.push(result.config);
    }
  }
  return { config, errors };
}
