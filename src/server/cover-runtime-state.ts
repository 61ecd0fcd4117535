import {
  type CoverStateLabel,
  type Movement,
  POSITION_CLOSED,
  POSITION_OPEN,
} from "../shared/cover-state.ts";

export type LastOperation =
  | "none"
  | "open"
  | "close"
  | "stop"
  | "set_position"
  | "tilt";

export interface CoverRuntimeState {
  state: CoverStateLabel;
  position?: number;
  tiltPosition?: number;
  movement: Movement;
  closed?: boolean;
  lastKnownPosition?: number;
  tmpPosition?: number;
  lastOperation: LastOperation;
  startTime?: number; // epoch ms
  lastStatus?: string;
  // Bumped whenever a scheduled callback is armed or cancelled. A callback
  // only runs if the token it captured is still current.
  commandToken: number;
  readonly travelTime: number; // seconds
}

export function createRuntimeState(travelTime: number): CoverRuntimeState {
  return {
    state: "unknown",
    movement: "idle",
    lastOperation: "none",
    commandToken: 0,
    travelTime,
  };
}

export function stoppedLabel(position: number | undefined): CoverStateLabel {
  if (position === POSITION_CLOSED) {
    return "closed";
  } else if (position === POSITION_OPEN) {
    return "open";
  }
  return "stopped";
}

export function markUnknown(state: CoverRuntimeState): void {
  state.state = "unknown";
  state.movement = "idle";
  state.position = undefined;
  state.tiltPosition = undefined;
  state.closed = undefined;
  state.tmpPosition = undefined;
  state.startTime = undefined;
}

export function elapsedSeconds(state: CoverRuntimeState, now: number): number {
  return state.startTime !== undefined ? (now - state.startTime) / 1000 : 0;
}
