import { vi } from "vitest";
import winston from "winston";
import {
  CoverController,
  type CoverChannelOptions,
} from "../src/server/cover-controller.ts";
import {
  type StatusCallback,
  type Transmitter,
} from "../src/server/transmitter.ts";

export const TEST_SERIAL = "test-serial";

export function createLogger(): winston.Logger {
  return winston.createLogger({ silent: true });
}

export function createTransmitter(serialNumber = TEST_SERIAL) {
  const callbacks = new Map<number, StatusCallback>();
  const transmitter = {
    setChannel: vi.fn((channel: number, callback: StatusCallback) => {
      callbacks.set(channel, callback);
      return true;
    }),
    getSerialNumber: vi.fn(() => serialNumber),
    up: vi.fn(),
    down: vi.fn(),
    stop: vi.fn(),
    ventilationTilting: vi.fn(),
    intermediate: vi.fn(),
    info: vi.fn(),
  } satisfies Transmitter;

  // deliver a status report the way the radio stick would
  const send = (channel: number, status: string) => {
    callbacks.get(channel)?.({ status });
  };
  return { transmitter, send };
}

export function createCover(
  options: Partial<CoverChannelOptions> = {},
  logger = createLogger()
) {
  const { transmitter, send } = createTransmitter();
  const cover = new CoverController(
    transmitter,
    {
      name: "Test Cover",
      channel: 3,
      deviceClass: "roller shutter",
      supportedFeatures: ["open", "close", "stop", "set_position"],
      travelTime: 50,
      ...options,
    },
    logger
  );
  return {
    cover,
    transmitter,
    logger,
    send: (status: string) => send(cover.channel, status),
  };
}
