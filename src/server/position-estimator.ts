import { POSITION_CLOSED, POSITION_OPEN } from "../shared/cover-state.ts";

export type Direction = "opening" | "closing";

export function clampPosition(value: number): number {
  return Math.max(POSITION_CLOSED, Math.min(POSITION_OPEN, value));
}

/**
 * Estimate where a cover is after moving for `elapsedSeconds` from
 * `tmpPosition`, given the time a full 0-100 traversal takes.
 */
export function estimatePosition(
  tmpPosition: number,
  elapsedSeconds: number,
  travelTime: number,
  direction: Direction
): number {
  const delta = (Math.max(0, elapsedSeconds) / travelTime) * 100;
  if (direction === "opening") {
    return clampPosition(Math.min(tmpPosition + delta, POSITION_OPEN));
  }
  return clampPosition(Math.max(tmpPosition - delta, POSITION_CLOSED));
}

// seconds needed to travel between two positions
export function moveDuration(
  from: number,
  to: number,
  travelTime: number
): number {
  return (Math.abs(to - from) / 100) * travelTime;
}
