import { type Logger } from "winston";
import { type CoverConfig } from "./config.ts";
import { CoverController } from "./cover-controller.ts";
import { ConfigurationError } from "./errors.ts";
import { type TransmitterRegistry } from "./transmitter.ts";

/**
 * Build a controller for every configured cover. A cover that references an
 * unknown transmitter or carries an invalid setting is reported and skipped.
 */
export function setupCovers(
  covers: CoverConfig[],
  registry: TransmitterRegistry,
  logger: Logger
): CoverController[] {
  const controllers: CoverController[] = [];
  for (const cover of covers) {
    const transmitter = registry.get(cover.transmitterSerialNumber);
    if (!transmitter) {
      logger.error(
        `The transmitter '${cover.transmitterSerialNumber}' of the '${cover.channel}' - '${cover.name}' channel is non-existent transmitter!`
      );
      continue;
    }

    try {
      controllers.push(
        new CoverController(
          transmitter,
          {
            name: cover.name,
            channel: cover.channel,
            deviceClass: cover.deviceClass,
            supportedFeatures: cover.supportedFeatures,
            travelTime: cover.travelTime,
          },
          logger
        )
      );
    } catch (err) {
      if (err instanceof ConfigurationError) {
        logger.error(err.message);
        continue;
      }
      throw err;
    }
  }
  return controllers;
}
