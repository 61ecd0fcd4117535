export const POSITION_CLOSED = 0;
export const POSITION_TILT_VENTILATION = 25;
export const POSITION_UNDEFINED = 50;
export const POSITION_INTERMEDIATE = 75;
export const POSITION_OPEN = 100;

export type Movement = "idle" | "opening" | "closing";

export type CoverStateLabel =
  | "unknown"
  | "open"
  | "closed"
  | "opening"
  | "closing"
  | "stopped"
  | "intermediate"
  | "ventilation/tilt"
  | "undefined";

export type CoverState = {
  id: string;
  name: string;
  channel: number;
  deviceClass: string;
  available: boolean;
  state: CoverStateLabel;
  position: number | null;
  tiltPosition: number | null;
  isOpening: boolean;
  isClosing: boolean;
  isClosed: boolean | null;
  lastStatus: string | null;
  travelTime: number;
  lastKnownPosition: number | null;
};
