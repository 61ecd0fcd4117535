import * as hap from "hap-nodejs";
import * as config from "./config.ts";
import { type CoverEvent, type CoverController } from "./cover-controller.ts";
import { type CoverFault } from "./errors.ts";
import { STATUS_BLOCKING } from "./status-code.ts";

// HomeKit tilt angles run from -90 to 90, cover tilt positions from 0 to 100
const DEGREES_PER_TILT_STEP = 1.8;

export function tiltToAngle(tiltPosition: number): number {
  return Math.round((tiltPosition - 50) * DEGREES_PER_TILT_STEP);
}

export function angleToTilt(angle: number): number {
  return Math.round(angle / DEGREES_PER_TILT_STEP + 50);
}

function positionState(cover: CoverController): number {
  if (cover.isOpening) {
    return hap.Characteristic.PositionState.INCREASING;
  } else if (cover.isClosing) {
    return hap.Characteristic.PositionState.DECREASING;
  }
  return hap.Characteristic.PositionState.STOPPED;
}

function currentPosition(cover: CoverController): number {
  return cover.position ?? cover.lastKnownPosition ?? 0;
}

function toNumber(value: hap.CharacteristicValue): number {
  if (typeof value !== "number") {
    throw new hap.HapStatusError(hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
  }
  return value;
}

// End stops map to open and close, anything in between to a timed move.
export function applyTargetPosition(
  cover: CoverController,
  position: number
): void {
  const feature =
    position === 100 ? "open" : position === 0 ? "close" : "set_position";
  if (!cover.supports(feature)) {
    throw new hap.HapStatusError(hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
  }
  if (feature === "open") {
    cover.open();
  } else if (feature === "close") {
    cover.close();
  } else if (cover.setPosition(position)) {
    throw new hap.HapStatusError(hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
  }
}

/**
 * Expose one cover channel as a HomeKit WindowCovering accessory.
 */
export default function (cover: CoverController): hap.Accessory {
  const accessoryUUID = hap.uuid.generate(
    `hap-nodejs:accessories:cover:${cover.uniqueId}`
  );
  const accessory = new hap.Accessory(cover.name, accessoryUUID);

  accessory
    .getService(hap.Service.AccessoryInformation)!
    .setCharacteristic(hap.Characteristic.Manufacturer, config.MANUFACTURER)
    .setCharacteristic(hap.Characteristic.Model, config.MODEL)
    .setCharacteristic(hap.Characteristic.SerialNumber, cover.uniqueId);

  const service = accessory.addService(hap.Service.WindowCovering, cover.name);
  let targetPosition = currentPosition(cover);

  service
    .getCharacteristic(hap.Characteristic.CurrentPosition)
    .onGet(() => currentPosition(cover));

  service
    .getCharacteristic(hap.Characteristic.TargetPosition)
    .onGet(() => targetPosition)
    .onSet((value) => {
      const position = toNumber(value);
      applyTargetPosition(cover, position);
      targetPosition = position;
    });

  service
    .getCharacteristic(hap.Characteristic.PositionState)
    .onGet(() => positionState(cover));

  service
    .getCharacteristic(hap.Characteristic.HoldPosition)
    .onSet((value) => {
      if (value) {
        cover.stop();
      }
    });

  service
    .getCharacteristic(hap.Characteristic.ObstructionDetected)
    .onGet(() => cover.lastStatus === STATUS_BLOCKING);

  if (cover.supports("set_tilt_position")) {
    service
      .getCharacteristic(hap.Characteristic.CurrentHorizontalTiltAngle)
      .onGet(() => tiltToAngle(cover.tiltPosition ?? 50));
    service
      .getCharacteristic(hap.Characteristic.TargetHorizontalTiltAngle)
      .onGet(() => tiltToAngle(cover.tiltPosition ?? 50))
      .onSet((value) => {
        const error = cover.setTiltPosition(angleToTilt(toNumber(value)));
        if (error) {
          throw new hap.HapStatusError(
            hap.HAPStatus.INVALID_VALUE_IN_REQUEST
          );
        }
      });
  }

  cover.on("change", function ({ state }: CoverEvent) {
    if (!state.isOpening && !state.isClosing && state.position !== null) {
      targetPosition = state.position;
    }
    service
      .getCharacteristic(hap.Characteristic.CurrentPosition)
      .updateValue(currentPosition(cover));
    service
      .getCharacteristic(hap.Characteristic.TargetPosition)
      .updateValue(targetPosition);
    service
      .getCharacteristic(hap.Characteristic.PositionState)
      .updateValue(positionState(cover));
  });

  cover.on("fault", function (fault: CoverFault) {
    service
      .getCharacteristic(hap.Characteristic.ObstructionDetected)
      .updateValue(fault.status === STATUS_BLOCKING);
  });

  return accessory;
}
