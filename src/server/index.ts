import http from "http";
import fs from "fs";
import storage from "node-persist";
import * as hap from "hap-nodejs";
import coverAccessory from "./cover-accessory.ts";

import express from "express";
import type { Express } from "express";

//express middleware
import morgan from "morgan";
import compression from "compression";
import errorHandler from "errorhandler";
import bodyParser from "body-parser";
import winston from "winston";

import * as config from "./config.ts";
import { configureApiRoutes } from "./api.ts";
import { type CoverController } from "./cover-controller.ts";
import { restoreCover, trackCover } from "./persistence.ts";
import { setupCovers } from "./setup.ts";
import { SimulatedTransmitter } from "./simulated-transmitter.ts";
import { TransmitterRegistry } from "./transmitter.ts";

// Configure express and its middleware
const app: Express = express();
const port = process.env.PORT || config.APP_SERVER_PORT;

app.enable("trust proxy");
app.set("port", port);
app.use(compression());

// configure logging
app.locals.logger = winston.createLogger({
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(
      (info) => `${info.timestamp} - ${info.level}: ${info.message}`
    )
  ),
  transports: [
    new winston.transports.Console({
      level: config.LOG_LEVEL,
    }),
  ],
});
app.use(
  morgan("combined", {
    stream: {
      write: (message: string) => {
        app.locals.logger?.verbose(message);
      },
    },
  })
);

app.use(bodyParser.json());
if (process.env.NODE_ENV !== "production") {
  app.use(errorHandler());
}

(async () => {
  // setup storage engine
  await storage.init({
    dir: config.STORAGE_DIR,
    forgiveParseErrors: true,
  });

  const covers = await createCovers(app.locals.logger);
  app.locals.covers = new Map(covers.map((cover) => [cover.uniqueId, cover]));
  configureApiRoutes(app);
  await startServer(app);
  startHomekitBridge(app, covers);
  startPolling(covers);
})().catch((err: unknown) => {
  app.locals.logger?.error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});

async function createCovers(
  logger: winston.Logger
): Promise<CoverController[]> {
  const { config: appConfig, errors } = config.parseAppConfig(
    JSON.parse(fs.readFileSync(config.COVERS_CONFIG, "utf8"))
  );
  for (const error of errors) {
    logger.error(`Invalid configuration: ${error}`);
  }

  // No radio driver is bundled, every configured transmitter is simulated
  const registry = new TransmitterRegistry();
  for (const transmitter of appConfig.transmitters) {
    logger.warn(
      `Transmitter '${transmitter.serialNumber}' is simulated, no radio commands are sent`
    );
    registry.add(
      new SimulatedTransmitter(
        transmitter.serialNumber,
        transmitter.travelTime,
        logger
      )
    );
  }

  const covers = setupCovers(appConfig.covers, registry, logger);
  for (const cover of covers) {
    await restoreCover(storage, cover, logger);
    trackCover(storage, cover, logger);
    cover.update();
    logger.info(`Added cover '${cover.name}' (${cover.uniqueId})`);
  }
  return covers;
}

// Other remotes can move the covers too, so their status is polled.
function startPolling(covers: CoverController[]): void {
  const controlLoop = setInterval(() => {
    for (const cover of covers) {
      cover.update();
    }
  }, config.POLL_INTERVAL);

  const cleanup = () => {
    clearInterval(controlLoop);
    for (const cover of covers) {
      cover.dispose();
    }
    process.exit();
  };
  process.on("SIGINT", cleanup);
  process.on("SIGTERM", cleanup);
}

function startHomekitBridge(app: Express, covers: CoverController[]) {
  const bridge = new hap.Bridge(
    config.BRIDGE_NAME,
    hap.uuid.generate("hap-nodejs:bridges:radio-covers")
  );
  for (const cover of covers) {
    bridge.addBridgedAccessory(coverAccessory(cover));
  }
  bridge
    .publish({
      port: config.HOMEKIT_PORT,
      username: config.HOMEKIT_USERNAME,
      pincode: config.HOMEKIT_PINCODE,
      category: hap.Categories.BRIDGE,
    })
    .then(() => {
      app.locals.logger?.info("Published HomeKit Bridge Info");
    })
    .catch((err: unknown) => {
      app.locals.logger?.error(
        `Failed to publish HomeKit bridge: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    });
}

async function startServer(app: Express): Promise<void> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    let started = false;
    server
      .listen(port, () => {
        app.locals.logger?.info(
          "Express server awaiting connections on port " + port
        );
        resolve();
        started = true;
      })
      .on("error", (err: NodeJS.ErrnoException) => {
        if (started) {
          app.locals.logger?.error(err.stack);
          process.exit(1);
        } else if (err.code === "EACCES") {
          app.locals.logger?.error(
            `Unable to listen on port ${port}. This is usually due to the process not having permissions to bind to this port. Did you mean to run the server in dev mode with a non-priviledged port instead?`
          );
          reject(err);
        } else if (err.code === "EADDRINUSE") {
          app.locals.logger?.error(
            `Unable to listen on port ${port} because another process is already listening on this port. Do you have another instance of the server already running?`
          );
          reject(err);
        } else {
          reject(err);
        }
      });
  });
}
