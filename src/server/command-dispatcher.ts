import { type Logger } from "winston";
import {
  POSITION_CLOSED,
  POSITION_INTERMEDIATE,
  POSITION_OPEN,
  POSITION_TILT_VENTILATION,
  POSITION_UNDEFINED,
} from "../shared/cover-state.ts";
import {
  type CoverRuntimeState,
  elapsedSeconds,
  stoppedLabel,
} from "./cover-runtime-state.ts";
import { InvalidCommandError } from "./errors.ts";
import {
  type Direction,
  estimatePosition,
  moveDuration,
} from "./position-estimator.ts";
import { type Transmitter } from "./transmitter.ts";

/**
 * Everything a command needs from the controller that owns the channel. The
 * controller keeps the single scheduled-callback slot; `schedule` replaces
 * whatever is armed and `cancel` clears it.
 */
export interface DispatchContext {
  readonly transmitter: Transmitter;
  readonly channel: number;
  readonly state: CoverRuntimeState;
  readonly logger: Logger;
  now(): number;
  schedule(delaySeconds: number, callback: () => void): void;
  cancel(): void;
}

interface MoveOptions {
  suppressPosition?: boolean;
}

function move(
  ctx: DispatchContext,
  direction: Direction,
  options: MoveOptions
): void {
  const { state } = ctx;
  if (direction === "opening") {
    ctx.transmitter.up(ctx.channel);
  } else {
    ctx.transmitter.down(ctx.channel);
  }

  state.tmpPosition = state.position ?? state.lastKnownPosition;
  state.startTime = ctx.now();
  state.movement = direction;
  state.lastOperation = direction === "opening" ? "open" : "close";
  state.state = direction;
  state.closed = false;
  state.tiltPosition = POSITION_UNDEFINED;
  if (!options.suppressPosition) {
    state.position = direction === "opening" ? POSITION_OPEN : POSITION_CLOSED;
  }

  // once a full traversal has had time to finish, ask the cover where it is
  ctx.schedule(state.travelTime, () => ctx.transmitter.info(ctx.channel));
}

export function open(ctx: DispatchContext, options: MoveOptions = {}): void {
  ctx.logger.info(`Channel ${ctx.channel}: opening`);
  move(ctx, "opening", options);
}

export function close(ctx: DispatchContext, options: MoveOptions = {}): void {
  ctx.logger.info(`Channel ${ctx.channel}: closing`);
  move(ctx, "closing", options);
}

export function stop(ctx: DispatchContext): void {
  const { state } = ctx;
  ctx.logger.info(`Channel ${ctx.channel}: stopping`);
  ctx.transmitter.stop(ctx.channel);
  ctx.cancel();

  if (state.movement !== "idle" && state.tmpPosition !== undefined) {
    const estimate = estimatePosition(
      state.tmpPosition,
      elapsedSeconds(state, ctx.now()),
      state.travelTime,
      state.movement
    );
    state.tmpPosition = estimate;
    state.position = Math.round(estimate);
    state.lastKnownPosition = state.position;
  }

  state.movement = "idle";
  state.lastOperation = "stop";
  state.startTime = undefined;
  state.state = stoppedLabel(state.position);
  state.closed = state.position === POSITION_CLOSED;
  state.tiltPosition = POSITION_UNDEFINED;
}

export function setPosition(
  ctx: DispatchContext,
  requested: number
): InvalidCommandError | null {
  const { state } = ctx;
  if (!Number.isFinite(requested) || requested < 0 || requested > 100) {
    return reject(
      ctx,
      `Invalid position ${requested}: must be between 0 and 100`
    );
  }
  // positions are whole percentages
  const target = Math.round(requested);
  const current = state.lastKnownPosition;
  if (current === undefined) {
    return reject(
      ctx,
      "Cannot set position because the last known position is unavailable"
    );
  }
  if (target === current) {
    ctx.logger.verbose(
      `Channel ${ctx.channel}: already at position ${target}, nothing to do`
    );
    return null;
  }

  const moveTime = moveDuration(current, target, state.travelTime);
  ctx.logger.verbose(
    `Channel ${ctx.channel}: moving ${current} -> ${target} for ${moveTime}s`
  );
  if (target > current) {
    open(ctx, { suppressPosition: true });
  } else {
    close(ctx, { suppressPosition: true });
  }
  state.tmpPosition = current;
  state.lastOperation = "set_position";

  ctx.schedule(moveTime, () => {
    ctx.logger.verbose(
      `Channel ${ctx.channel}: target position ${target} reached`
    );
    stop(ctx);
    state.position = target;
    state.lastKnownPosition = target;
    state.tmpPosition = target;
    state.state = stoppedLabel(target);
    state.closed = target === POSITION_CLOSED;
  });
  return null;
}

export function ventilationTilt(ctx: DispatchContext): void {
  const { state } = ctx;
  ctx.logger.info(`Channel ${ctx.channel}: ventilation/tilt position`);
  ctx.transmitter.ventilationTilting(ctx.channel);
  ctx.cancel();
  state.movement = "idle";
  state.startTime = undefined;
  state.lastOperation = "tilt";
  state.state = "ventilation/tilt";
  state.closed = false;
  state.position = POSITION_TILT_VENTILATION;
  state.tiltPosition = POSITION_TILT_VENTILATION;
}

export function intermediate(ctx: DispatchContext): void {
  const { state } = ctx;
  ctx.logger.info(`Channel ${ctx.channel}: intermediate position`);
  ctx.transmitter.intermediate(ctx.channel);
  ctx.cancel();
  state.movement = "idle";
  state.startTime = undefined;
  state.lastOperation = "tilt";
  state.state = "intermediate";
  state.closed = false;
  state.position = POSITION_INTERMEDIATE;
  state.tiltPosition = POSITION_INTERMEDIATE;
}

export function setTiltPosition(
  ctx: DispatchContext,
  tilt: number
): InvalidCommandError | null {
  if (!Number.isFinite(tilt) || tilt < 0 || tilt > 100) {
    return reject(ctx, `Invalid tilt position ${tilt}: must be between 0 and 100`);
  }
  if (tilt < POSITION_UNDEFINED) {
    ventilationTilt(ctx);
  } else if (tilt > POSITION_UNDEFINED) {
    intermediate(ctx);
  } else {
    return reject(ctx, `Wrong tilt position slider data: ${tilt}`);
  }
  return null;
}

function reject(ctx: DispatchContext, message: string): InvalidCommandError {
  ctx.logger.error(`Channel ${ctx.channel}: ${message}`);
  return new InvalidCommandError(message);
}
