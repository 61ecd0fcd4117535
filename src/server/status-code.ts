export const STATUS_NO_INFORMATION = "no_information";
export const STATUS_TOP_POSITION_STOP = "top_position_stop";
export const STATUS_BOTTOM_POSITION_STOP = "bottom_position_stop";
export const STATUS_INTERMEDIATE_POSITION_STOP = "intermediate_position_stop";
export const STATUS_TILT_VENTILATION_POS_STOP =
  "tilt_ventilation_position_stop";
export const STATUS_BLOCKING = "blocking";
export const STATUS_OVERHEATED = "overheated";
export const STATUS_TIMEOUT = "timeout";
export const STATUS_START_TO_MOVE_UP = "start_to_move_up";
export const STATUS_START_TO_MOVE_DOWN = "start_to_move_down";
export const STATUS_MOVING_UP = "moving_up";
export const STATUS_MOVING_DOWN = "moving_down";
export const STATUS_STOPPED_IN_UNDEFINED_POSITION =
  "stopped_in_undefined_position";
export const STATUS_TOP_POS_STOP_WITH_TILT_POS =
  "top_position_stop_which_is_tilt_position";
export const STATUS_BOTTOM_POS_STOP_WITH_INT_POS =
  "bottom_position_stop_which_is_intermediate_position";
export const STATUS_SWITCHING_DEVICE_SWITCHED_OFF =
  "switching_device_switched_off";
export const STATUS_SWITCHING_DEVICE_SWITCHED_ON =
  "switching_device_switched_on";

export const STATUS_CODES = [
  STATUS_NO_INFORMATION,
  STATUS_TOP_POSITION_STOP,
  STATUS_BOTTOM_POSITION_STOP,
  STATUS_INTERMEDIATE_POSITION_STOP,
  STATUS_TILT_VENTILATION_POS_STOP,
  STATUS_BLOCKING,
  STATUS_OVERHEATED,
  STATUS_TIMEOUT,
  STATUS_START_TO_MOVE_UP,
  STATUS_START_TO_MOVE_DOWN,
  STATUS_MOVING_UP,
  STATUS_MOVING_DOWN,
  STATUS_STOPPED_IN_UNDEFINED_POSITION,
  STATUS_TOP_POS_STOP_WITH_TILT_POS,
  STATUS_BOTTOM_POS_STOP_WITH_INT_POS,
  STATUS_SWITCHING_DEVICE_SWITCHED_OFF,
  STATUS_SWITCHING_DEVICE_SWITCHED_ON,
] as const;

export type StatusCode = (typeof STATUS_CODES)[number];

// What a transmitter hands to the channel callback. The status is a raw
// string since a transmitter may report codes newer than this list.
export interface StatusResponse {
  status: string;
}

export function isStatusCode(value: string): value is StatusCode {
  return (STATUS_CODES as readonly string[]).includes(value);
}

export function isDeviceFault(status: StatusCode): boolean {
  return (
    status === STATUS_BLOCKING ||
    status === STATUS_OVERHEATED ||
    status === STATUS_TIMEOUT
  );
}

export function isMovingUp(status: StatusCode): boolean {
  return status === STATUS_START_TO_MOVE_UP || status === STATUS_MOVING_UP;
}

export function isMovingDown(status: StatusCode): boolean {
  return status === STATUS_START_TO_MOVE_DOWN || status === STATUS_MOVING_DOWN;
}
