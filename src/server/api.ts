import type { Application, Request, Response } from "express";
import * as winston from "winston";
import * as config from "./config.ts";
import { type CoverFeature } from "./config.ts";
import {
  type CoverEvent,
  type CoverController,
} from "./cover-controller.ts";
import { type InvalidCommandError } from "./errors.ts";

declare global {
  namespace Express {
    interface Locals {
      covers: Map<string, CoverController>;
      logger: winston.Logger;
    }
  }
}

// a string or error result means the command was rejected
type CommandResult = InvalidCommandError | string | null | void;

type Command = {
  feature: CoverFeature;
  run: (cover: CoverController, body: Record<string, unknown>) => CommandResult;
};

function numberArg(body: Record<string, unknown>, key: string): number | null {
  const value = body[key];
  return typeof value === "number" ? value : null;
}

const COMMANDS: Record<string, Command> = {
  open: { feature: "open", run: (cover) => cover.open() },
  close: { feature: "close", run: (cover) => cover.close() },
  stop: { feature: "stop", run: (cover) => cover.stop() },
  set_position: {
    feature: "set_position",
    run: (cover, body) => {
      const position = numberArg(body, "position");
      return position === null
        ? "position must be a number"
        : cover.setPosition(position);
    },
  },
  open_tilt: { feature: "open_tilt", run: (cover) => cover.openTilt() },
  close_tilt: { feature: "close_tilt", run: (cover) => cover.closeTilt() },
  stop_tilt: { feature: "stop_tilt", run: (cover) => cover.stopTilt() },
  set_tilt_position: {
    feature: "set_tilt_position",
    run: (cover, body) => {
      const tiltPosition = numberArg(body, "tiltPosition");
      return tiltPosition === null
        ? "tiltPosition must be a number"
        : cover.setTiltPosition(tiltPosition);
    },
  },
};

export function configureApiRoutes(app: Application): void {
  function waitForCoverEvent(
    cover: CoverController,
    timeout: number,
    callback: (timedOut: boolean, event: CoverEvent | null) => void
  ): void {
    let listener: ((event: CoverEvent) => void) | null = null;
    const timeoutHandle = setTimeout(() => {
      if (listener) {
        cover.removeListener("change", listener);
      }
      callback(true, null);
    }, timeout);

    listener = (event: CoverEvent) => {
      if (listener) {
        cover.removeListener("change", listener);
      }
      clearTimeout(timeoutHandle);
      callback(false, event);
    };

    cover.addListener("change", listener);
  }

  function findCover(req: Request, res: Response): CoverController | null {
    const id = req.params.id;
    const cover = typeof id === "string" ? req.app.locals.covers.get(id) : null;
    if (!cover) {
      res.status(404).json({ success: false, error: "Unknown cover" });
      return null;
    }
    return cover;
  }

  app.get("/api/1/covers", (req: Request, res: Response) => {
    res.json({
      success: true,
      covers: [...req.app.locals.covers.values()].map((cover) =>
        cover.getState()
      ),
    });
  });

  app.get("/api/1/covers/:id", (req: Request, res: Response) => {
    const cover = findCover(req, res);
    if (cover) {
      res.json({
        success: true,
        state: cover.getState(),
        attributes: cover.getAttributes(),
      });
    }
  });

  app.get("/api/1/covers/:id/poll-state", (req: Request, res: Response) => {
    const cover = findCover(req, res);
    if (!cover) {
      return;
    }
    const queryState =
      typeof req.query.state === "string" ? req.query.state : "";

    if (queryState !== JSON.stringify(cover.getState())) {
      res.json({
        success: true,
        change: true,
        state: cover.getState(),
      });
      return;
    }

    const requested =
      typeof req.query.timeout === "string"
        ? parseInt(req.query.timeout, 10)
        : NaN;
    const timeout = Number.isNaN(requested)
      ? config.LONGPOLL_TIMEOUT
      : Math.min(requested, config.MAX_LONGPOLL_TIMEOUT);

    res.writeHead(200, {
      "Content-Type": "application/json",
    });
    res.write(""); // flush headers to the client
    waitForCoverEvent(cover, timeout, (timedOut, event) => {
      res.write(
        JSON.stringify({
          success: true,
          change: timedOut
            ? false
            : queryState !== JSON.stringify(event?.state),
          state: timedOut ? null : event?.state,
        })
      );
      res.end();
    });
  });

  app.post("/api/1/covers/:id/command", (req: Request, res: Response) => {
    const cover = findCover(req, res);
    if (!cover) {
      return;
    }
    const body: Record<string, unknown> =
      typeof req.body === "object" && req.body !== null ? req.body : {};
    const name = typeof body.command === "string" ? body.command : "";
    const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

    if (!command) {
      res.status(400).json({ success: false, error: "Invalid command" });
      return;
    }
    if (!cover.supports(command.feature)) {
      res.status(400).json({
        success: false,
        error: `'${cover.name}' does not support ${command.feature}`,
      });
      return;
    }

    try {
      const error = command.run(cover, body);
      if (error) {
        res.status(400).json({
          success: false,
          error: typeof error === "string" ? error : error.message,
        });
        return;
      }
      res.json({
        success: true,
        state: cover.getState(),
      });
    } catch (err) {
      req.app.locals.logger?.error(
        err instanceof Error ? err.stack : String(err)
      );
      res.status(500).json({
        success: false,
      });
    }
  });
}
