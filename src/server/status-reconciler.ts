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
  markUnknown,
  stoppedLabel,
} from "./cover-runtime-state.ts";
import { type CoverFaultKind } from "./errors.ts";
import { estimatePosition } from "./position-estimator.ts";
import {
  isDeviceFault,
  isMovingDown,
  isMovingUp,
  isStatusCode,
  STATUS_BOTTOM_POS_STOP_WITH_INT_POS,
  STATUS_BOTTOM_POSITION_STOP,
  STATUS_INTERMEDIATE_POSITION_STOP,
  STATUS_STOPPED_IN_UNDEFINED_POSITION,
  STATUS_TILT_VENTILATION_POS_STOP,
  STATUS_TOP_POS_STOP_WITH_TILT_POS,
  STATUS_TOP_POSITION_STOP,
} from "./status-code.ts";

export interface Reconciliation {
  // true while the cover reports it is still moving, in which case any
  // pending completion callback stays armed; otherwise the owner drops it
  moving: boolean;
  fault: CoverFaultKind | null;
}

/**
 * Apply a status reported by the hardware to the channel state. The report
 * is authoritative and overwrites whatever the last command assumed.
 */
export function reconcile(
  state: CoverRuntimeState,
  status: string,
  now: number
): Reconciliation {
  state.lastStatus = status;
  const result = applyStatus(state, status, now);

  if (state.position !== undefined) {
    state.lastKnownPosition = state.position;
  }
  if (!result.moving) {
    state.movement = "idle";
    state.startTime = undefined;
    // the move the hardware just ended no longer owns the position
    if (state.lastOperation === "set_position") {
      state.lastOperation = "none";
    }
  }
  return result;
}

function applyStatus(
  state: CoverRuntimeState,
  status: string,
  now: number
): Reconciliation {
  if (!isStatusCode(status)) {
    markUnknown(state);
    return { moving: false, fault: "unhandled-status" };
  }
  if (isDeviceFault(status)) {
    markUnknown(state);
    return { moving: false, fault: "device-fault" };
  }

  if (isMovingUp(status) || isMovingDown(status)) {
    const direction = isMovingUp(status) ? "opening" : "closing";
    state.state = direction;
    state.movement = direction;
    state.closed = false;
    state.tiltPosition = POSITION_UNDEFINED;
    // a set-position move leaves the final position to its completion
    if (state.lastOperation !== "set_position") {
      state.position =
        direction === "opening" ? POSITION_OPEN : POSITION_CLOSED;
    }
    return { moving: true, fault: null };
  }

  switch (status) {
    case STATUS_TOP_POSITION_STOP:
      setStopped(state, "open", POSITION_OPEN, POSITION_UNDEFINED, false);
      break;
    case STATUS_BOTTOM_POSITION_STOP:
      setStopped(state, "closed", POSITION_CLOSED, POSITION_UNDEFINED, true);
      break;
    case STATUS_INTERMEDIATE_POSITION_STOP:
      setStopped(
        state,
        "intermediate",
        POSITION_INTERMEDIATE,
        POSITION_INTERMEDIATE,
        false
      );
      break;
    case STATUS_TILT_VENTILATION_POS_STOP:
    case STATUS_TOP_POS_STOP_WITH_TILT_POS:
      setStopped(
        state,
        "ventilation/tilt",
        POSITION_TILT_VENTILATION,
        POSITION_TILT_VENTILATION,
        false
      );
      break;
    case STATUS_BOTTOM_POS_STOP_WITH_INT_POS:
      setStopped(
        state,
        "intermediate",
        POSITION_INTERMEDIATE,
        POSITION_INTERMEDIATE,
        true
      );
      break;
    case STATUS_STOPPED_IN_UNDEFINED_POSITION:
      stoppedInUndefinedPosition(state, now);
      break;
    default:
      // no information, switching device on/off
      markUnknown(state);
  }
  return { moving: false, fault: null };
}

function setStopped(
  state: CoverRuntimeState,
  label: CoverRuntimeState["state"],
  position: number,
  tiltPosition: number,
  closed: boolean
): void {
  state.state = label;
  state.position = position;
  state.tmpPosition = position;
  state.tiltPosition = tiltPosition;
  state.closed = closed;
}

function stoppedInUndefinedPosition(
  state: CoverRuntimeState,
  now: number
): void {
  // a resting cover is estimated from where it was last seen, a moving one
  // from where its current move started
  const base =
    state.movement === "idle"
      ? state.lastKnownPosition ?? state.tmpPosition
      : state.tmpPosition ?? state.lastKnownPosition;
  state.tiltPosition = POSITION_UNDEFINED;
  if (base === undefined) {
    state.state = "undefined";
    state.position = undefined;
    state.closed = false;
    return;
  }

  const estimate =
    state.movement === "idle"
      ? base
      : estimatePosition(
          base,
          elapsedSeconds(state, now),
          state.travelTime,
          state.movement
        );
  state.tmpPosition = estimate;
  state.position = Math.round(estimate);
  state.state = stoppedLabel(state.position);
  state.closed = state.position === POSITION_CLOSED;
}
