import { type StatusResponse } from "./status-code.ts";

export type StatusCallback = (response: StatusResponse) => void;

/**
 * A radio stick that multiplexes up to 15 cover channels. Commands are fire
 * and forget; status arrives later through the callback registered with
 * `setChannel`.
 */
export interface Transmitter {
  setChannel(channel: number, callback: StatusCallback): boolean;
  getSerialNumber(): string;
  up(channel: number): void;
  down(channel: number): void;
  stop(channel: number): void;
  ventilationTilting(channel: number): void;
  intermediate(channel: number): void;
  info(channel: number): void;
}

export class TransmitterRegistry {
  private transmitters: Map<string, Transmitter>;

  constructor(transmitters: Transmitter[] = []) {
    this.transmitters = new Map();
    for (const transmitter of transmitters) {
      this.add(transmitter);
    }
  }

  add(transmitter: Transmitter): void {
    this.transmitters.set(transmitter.getSerialNumber(), transmitter);
  }

  get(serialNumber: string): Transmitter | undefined {
    return this.transmitters.get(serialNumber);
  }

  serialNumbers(): string[] {
    return [...this.transmitters.keys()];
  }
}
