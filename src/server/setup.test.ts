import { describe, it, expect, vi } from "vitest";
import { createLogger, createTransmitter } from "../../test/helpers.ts";
import { type CoverConfig } from "./config.ts";
import { setupCovers } from "./setup.ts";
import { TransmitterRegistry } from "./transmitter.ts";

const KITCHEN: CoverConfig = {
  name: "Kitchen",
  channel: 2,
  deviceClass: "roller shutter",
  supportedFeatures: ["up", "down", "stop"],
  transmitterSerialNumber: "test-serial",
  travelTime: 30,
};

describe("setupCovers", () => {
  it("creates a controller per configured cover", () => {
    const { transmitter } = createTransmitter();
    const registry = new TransmitterRegistry([transmitter]);

    const covers = setupCovers([KITCHEN], registry, createLogger());

    expect(covers).toHaveLength(1);
    expect(covers[0].uniqueId).toBe("test-serial_2");
    expect(covers[0].travelTime).toBe(30);
    expect(covers[0].supports("open")).toBe(true);
    expect(covers[0].supports("set_position")).toBe(false);
    expect(transmitter.setChannel).toHaveBeenCalledWith(2, expect.any(Function));
  });

  it("skips covers of unknown transmitters", () => {
    const logger = createLogger();
    const error = vi.spyOn(logger, "error");
    const registry = new TransmitterRegistry();

    const covers = setupCovers([KITCHEN], registry, logger);

    expect(covers).toEqual([]);
    expect(error).toHaveBeenCalledWith(
      "The transmitter 'test-serial' of the '2' - 'Kitchen' channel is non-existent transmitter!"
    );
  });

  it("skips covers with invalid settings and keeps the others", () => {
    const logger = createLogger();
    const error = vi.spyOn(logger, "error");
    const { transmitter } = createTransmitter();
    const registry = new TransmitterRegistry([transmitter]);

    const covers = setupCovers(
      [{ ...KITCHEN, name: "Broken", channel: 4, travelTime: -1 }, KITCHEN],
      registry,
      logger
    );

    expect(covers.map((cover) => cover.name)).toEqual(["Kitchen"]);
    expect(error).toHaveBeenCalledWith(
      "Travel time of 'Broken' must be positive, got -1"
    );
  });
});
