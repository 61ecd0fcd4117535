import { type Logger } from "winston";
import {
  type Movement,
  POSITION_CLOSED,
  POSITION_INTERMEDIATE,
  POSITION_OPEN,
  POSITION_TILT_VENTILATION,
} from "../shared/cover-state.ts";
import { estimatePosition, moveDuration } from "./position-estimator.ts";
import {
  type StatusCode,
  STATUS_BOTTOM_POSITION_STOP,
  STATUS_INTERMEDIATE_POSITION_STOP,
  STATUS_MOVING_DOWN,
  STATUS_MOVING_UP,
  STATUS_START_TO_MOVE_DOWN,
  STATUS_START_TO_MOVE_UP,
  STATUS_STOPPED_IN_UNDEFINED_POSITION,
  STATUS_TILT_VENTILATION_POS_STOP,
  STATUS_TOP_POSITION_STOP,
} from "./status-code.ts";
import { type StatusCallback, type Transmitter } from "./transmitter.ts";

export const RESPONSE_DELAY = 50; // milliseconds

type VirtualCover = {
  callback: StatusCallback;
  position: number;
  movement: Movement;
  startPosition: number;
  startTime: number;
  status: StatusCode;
  arrival: NodeJS.Timeout | null;
};

/**
 * A transmitter with virtual covers behind it, used when no radio stick is
 * attached. Each cover travels at a constant speed and answers commands the
 * way real hardware does: a start-to-move report shortly after the command
 * and an end-stop report once it arrives.
 */
export class SimulatedTransmitter implements Transmitter {
  private serialNumber: string;
  private travelTime: number;
  private logger: Logger;
  private covers: Map<number, VirtualCover>;

  constructor(serialNumber: string, travelTime: number, logger: Logger) {
    this.serialNumber = serialNumber;
    this.travelTime = travelTime;
    this.logger = logger;
    this.covers = new Map();
  }

  setChannel(channel: number, callback: StatusCallback): boolean {
    if (this.covers.has(channel)) {
      this.logger.error(
        `Transmitter '${this.serialNumber}': channel ${channel} is already in use`
      );
      return false;
    }
    this.covers.set(channel, {
      callback,
      position: POSITION_CLOSED,
      movement: "idle",
      startPosition: POSITION_CLOSED,
      startTime: 0,
      status: STATUS_BOTTOM_POSITION_STOP,
      arrival: null,
    });
    return true;
  }

  getSerialNumber(): string {
    return this.serialNumber;
  }

  up(channel: number): void {
    this.move(channel, "opening");
  }

  down(channel: number): void {
    this.move(channel, "closing");
  }

  stop(channel: number): void {
    const cover = this.covers.get(channel);
    if (!cover) {
      return;
    }
    this.settle(cover);
    if (cover.position === POSITION_OPEN) {
      cover.status = STATUS_TOP_POSITION_STOP;
    } else if (cover.position === POSITION_CLOSED) {
      cover.status = STATUS_BOTTOM_POSITION_STOP;
    } else {
      cover.status = STATUS_STOPPED_IN_UNDEFINED_POSITION;
    }
    this.respond(cover, cover.status);
  }

  ventilationTilting(channel: number): void {
    this.moveTo(
      channel,
      POSITION_TILT_VENTILATION,
      STATUS_TILT_VENTILATION_POS_STOP
    );
  }

  intermediate(channel: number): void {
    this.moveTo(
      channel,
      POSITION_INTERMEDIATE,
      STATUS_INTERMEDIATE_POSITION_STOP
    );
  }

  info(channel: number): void {
    const cover = this.covers.get(channel);
    if (cover) {
      this.respond(cover, cover.status);
    }
  }

  // current position of a virtual cover, for diagnostics
  positionOf(channel: number): number | undefined {
    const cover = this.covers.get(channel);
    if (!cover) {
      return undefined;
    }
    return this.currentPosition(cover);
  }

  private move(channel: number, direction: "opening" | "closing"): void {
    const cover = this.covers.get(channel);
    if (!cover) {
      return;
    }
    this.settle(cover);
    const target = direction === "opening" ? POSITION_OPEN : POSITION_CLOSED;
    if (cover.position === target) {
      this.respond(cover, cover.status);
      return;
    }

    cover.movement = direction;
    cover.startPosition = cover.position;
    cover.startTime = Date.now();
    cover.status =
      direction === "opening" ? STATUS_MOVING_UP : STATUS_MOVING_DOWN;
    this.respond(
      cover,
      direction === "opening"
        ? STATUS_START_TO_MOVE_UP
        : STATUS_START_TO_MOVE_DOWN
    );

    const duration = moveDuration(cover.position, target, this.travelTime);
    cover.arrival = setTimeout(() => {
      cover.arrival = null;
      cover.movement = "idle";
      cover.position = target;
      cover.status =
        direction === "opening"
          ? STATUS_TOP_POSITION_STOP
          : STATUS_BOTTOM_POSITION_STOP;
      this.deliver(cover, cover.status);
    }, duration * 1000);
  }

  // tilt presets are reached instantly
  private moveTo(channel: number, position: number, status: StatusCode): void {
    const cover = this.covers.get(channel);
    if (!cover) {
      return;
    }
    this.settle(cover);
    cover.position = position;
    cover.status = status;
    this.respond(cover, status);
  }

  private settle(cover: VirtualCover): void {
    cover.position = this.currentPosition(cover);
    cover.movement = "idle";
    if (cover.arrival) {
      clearTimeout(cover.arrival);
      cover.arrival = null;
    }
  }

  private currentPosition(cover: VirtualCover): number {
    if (cover.movement === "idle") {
      return cover.position;
    }
    return Math.round(
      estimatePosition(
        cover.startPosition,
        (Date.now() - cover.startTime) / 1000,
        this.travelTime,
        cover.movement
      )
    );
  }

  private respond(cover: VirtualCover, status: StatusCode): void {
    setTimeout(() => this.deliver(cover, status), RESPONSE_DELAY);
  }

  private deliver(cover: VirtualCover, status: StatusCode): void {
    this.logger.debug(`Transmitter '${this.serialNumber}': ${status}`);
    cover.callback({ status });
  }
}
