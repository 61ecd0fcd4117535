import { EventEmitter } from "events";
import { type Logger } from "winston";
import {
  type CoverState,
  POSITION_UNDEFINED,
} from "../shared/cover-state.ts";
import * as dispatcher from "./command-dispatcher.ts";
import { type DispatchContext } from "./command-dispatcher.ts";
import {
  COVER_DEVICE_CLASSES,
  type CoverCategory,
  type CoverFeature,
  DEFAULT_TRAVEL_TIME,
  MAX_CHANNEL,
  MIN_CHANNEL,
  toDeviceClass,
  toFeature,
} from "./config.ts";
import {
  type CoverRuntimeState,
  createRuntimeState,
  stoppedLabel,
} from "./cover-runtime-state.ts";
import {
  ConfigurationError,
  type CoverFault,
  type CoverFaultKind,
  describeFault,
  type InvalidCommandError,
} from "./errors.ts";
import { clampPosition } from "./position-estimator.ts";
import { reconcile } from "./status-reconciler.ts";
import { type Transmitter } from "./transmitter.ts";

export interface CoverEvent {
  state: CoverState;
}

export interface CoverChannelOptions {
  name: string;
  channel: number;
  deviceClass: string;
  supportedFeatures: string[];
  travelTime?: number;
}

// The attribute set that survives a restart.
export interface PersistedCoverAttributes {
  position?: number;
  lastKnownPosition?: number;
  tmpPosition?: number;
  isOpening?: boolean;
  isClosing?: boolean;
  closed?: boolean;
  tiltPosition?: number;
  lastStatus?: string;
}

/**
 * State machine for one cover on one transmitter channel. Commands update
 * the model optimistically, status reports from the transmitter reconcile
 * it, and a single scheduled callback slot finishes timed moves.
 *
 * Emits `change` with a {@link CoverEvent} after every state mutation and
 * `fault` with a {@link CoverFault} when the hardware reports a problem.
 */
export class CoverController extends EventEmitter {
  readonly name: string;
  readonly channel: number;
  readonly deviceClass: CoverCategory;
  readonly supportedFeatures: ReadonlySet<CoverFeature>;
  readonly available: boolean;

  private transmitter: Transmitter;
  private logger: Logger;
  private runtime: CoverRuntimeState;
  private context: DispatchContext;
  private timer: NodeJS.Timeout | null;
  private inbox: string[];
  private draining: boolean;

  constructor(
    transmitter: Transmitter,
    options: CoverChannelOptions,
    logger: Logger
  ) {
    super();

    const travelTime = options.travelTime ?? DEFAULT_TRAVEL_TIME;
    if (!Number.isFinite(travelTime) || travelTime <= 0) {
      throw new ConfigurationError(
        `Travel time of '${options.name}' must be positive, got ${travelTime}`
      );
    }
    if (
      !Number.isInteger(options.channel) ||
      options.channel < MIN_CHANNEL ||
      options.channel > MAX_CHANNEL
    ) {
      throw new ConfigurationError(
        `Channel of '${options.name}' must be between ${MIN_CHANNEL} and ${MAX_CHANNEL}, got ${options.channel}`
      );
    }
    const deviceClass = toDeviceClass(options.deviceClass);
    if (deviceClass === null) {
      throw new ConfigurationError(
        `Unsupported device class '${options.deviceClass}' for '${options.name}'`
      );
    }
    const features = new Set<CoverFeature>();
    for (const token of options.supportedFeatures) {
      const feature = toFeature(token);
      if (feature === null) {
        throw new ConfigurationError(
          `Unsupported feature '${token}' for '${options.name}'`
        );
      }
      features.add(feature);
    }

    this.name = options.name;
    this.channel = options.channel;
    this.deviceClass = COVER_DEVICE_CLASSES[deviceClass];
    this.supportedFeatures = features;
    this.transmitter = transmitter;
    this.logger = logger;
    this.runtime = createRuntimeState(travelTime);
    this.timer = null;
    this.inbox = [];
    this.draining = false;
    this.context = {
      transmitter,
      channel: this.channel,
      state: this.runtime,
      logger,
      now: () => Date.now(),
      schedule: (delaySeconds, callback) =>
        this.schedule(delaySeconds, callback),
      cancel: () => this.cancelScheduled(),
    };

    this.available = transmitter.setChannel(this.channel, (response) => {
      this.onStatus(response.status);
    });
  }

  get uniqueId(): string {
    return `${this.transmitter.getSerialNumber()}_${this.channel}`;
  }

  get serialNumber(): string {
    return this.transmitter.getSerialNumber();
  }

  get position(): number | undefined {
    return this.runtime.position;
  }

  get tiltPosition(): number | undefined {
    return this.runtime.tiltPosition;
  }

  get isOpening(): boolean {
    return this.runtime.movement === "opening";
  }

  get isClosing(): boolean {
    return this.runtime.movement === "closing";
  }

  get isClosed(): boolean | undefined {
    return this.runtime.closed;
  }

  get state(): CoverState["state"] {
    return this.runtime.state;
  }

  get lastStatus(): string | undefined {
    return this.runtime.lastStatus;
  }

  get lastKnownPosition(): number | undefined {
    return this.runtime.lastKnownPosition;
  }

  get travelTime(): number {
    return this.runtime.travelTime;
  }

  supports(feature: CoverFeature): boolean {
    return this.supportedFeatures.has(feature);
  }

  getState(): CoverState {
    const state = this.runtime;
    return {
      id: this.uniqueId,
      name: this.name,
      channel: this.channel,
      deviceClass: this.deviceClass,
      available: this.available,
      state: state.state,
      position: state.position ?? null,
      tiltPosition: state.tiltPosition ?? null,
      isOpening: this.isOpening,
      isClosing: this.isClosing,
      isClosed: state.closed ?? null,
      lastStatus: state.lastStatus ?? null,
      travelTime: state.travelTime,
      lastKnownPosition: state.lastKnownPosition ?? null,
    };
  }

  // Diagnostic attributes shown next to the cover state.
  getAttributes(): Record<string, string | number | null> {
    return {
      status: this.runtime.lastStatus ?? null,
      travel_time: this.runtime.travelTime,
      last_known_position: this.runtime.lastKnownPosition ?? null,
    };
  }

  // Request a fresh status. State only changes once the answer arrives.
  update(): void {
    this.transmitter.info(this.channel);
  }

  open(): void {
    dispatcher.open(this.context);
    this.changed();
  }

  close(): void {
    dispatcher.close(this.context);
    this.changed();
  }

  stop(): void {
    dispatcher.stop(this.context);
    this.changed();
  }

  setPosition(position: number): InvalidCommandError | null {
    const error = dispatcher.setPosition(this.context, position);
    // a move to where the cover already is does nothing at all
    if (!error && Math.round(position) !== this.runtime.lastKnownPosition) {
      this.changed();
    }
    return error;
  }

  ventilationTilt(): void {
    dispatcher.ventilationTilt(this.context);
    this.changed();
  }

  intermediate(): void {
    dispatcher.intermediate(this.context);
    this.changed();
  }

  closeTilt(): void {
    this.ventilationTilt();
  }

  openTilt(): void {
    this.intermediate();
  }

  stopTilt(): void {
    this.stop();
  }

  setTiltPosition(tiltPosition: number): InvalidCommandError | null {
    const error = dispatcher.setTiltPosition(this.context, tiltPosition);
    if (!error) {
      this.changed();
    }
    return error;
  }

  /**
   * Entry point for status reports. Reports are queued and applied one at a
   * time in arrival order, so a report delivered while another is being
   * applied (e.g. from a change listener) waits its turn.
   */
  onStatus(status: string): void {
    this.inbox.push(status);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.inbox.shift();
      while (next !== undefined) {
        this.applyStatus(next);
        next = this.inbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  restore(attributes: PersistedCoverAttributes): void {
    const state = this.runtime;
    const restored = (value: number | undefined) =>
      Math.round(clampPosition(value ?? POSITION_UNDEFINED));

    state.position = restored(attributes.position);
    state.lastKnownPosition = restored(attributes.lastKnownPosition);
    state.tmpPosition = clampPosition(
      attributes.tmpPosition ?? POSITION_UNDEFINED
    );
    state.tiltPosition = restored(attributes.tiltPosition);
    state.closed = attributes.closed ?? false;
    state.lastStatus = attributes.lastStatus;

    const isOpening = attributes.isOpening ?? false;
    const isClosing = attributes.isClosing ?? false;
    if (isOpening && !isClosing) {
      state.movement = "opening";
    } else if (isClosing && !isOpening) {
      state.movement = "closing";
    } else {
      state.movement = "idle";
    }

    if (state.movement !== "idle") {
      state.state = state.movement;
    } else if (state.closed) {
      state.state = "closed";
    } else {
      state.state = stoppedLabel(state.position);
    }
    this.logger.verbose(
      `Channel ${this.channel}: restored position ${state.position}`
    );
    this.changed();
  }

  toPersisted(): PersistedCoverAttributes {
    const state = this.runtime;
    return {
      position: state.position,
      lastKnownPosition: state.lastKnownPosition,
      tmpPosition: state.tmpPosition,
      isOpening: this.isOpening,
      isClosing: this.isClosing,
      closed: state.closed,
      tiltPosition: state.tiltPosition,
      lastStatus: state.lastStatus,
    };
  }

  // Stop any pending callback without touching the cover.
  dispose(): void {
    this.cancelScheduled();
  }

  private applyStatus(status: string): void {
    this.logger.verbose(`Channel ${this.channel}: status '${status}'`);
    const result = reconcile(this.runtime, status, Date.now());
    if (!result.moving && this.timer) {
      this.logger.verbose(
        `Channel ${this.channel}: '${status}' ends the pending command`
      );
      this.cancelScheduled();
    }
    if (result.fault) {
      this.reportFault(result.fault, status);
    }
    this.changed();
  }

  private reportFault(kind: CoverFaultKind, status: string): void {
    const fault: CoverFault = {
      kind,
      serialNumber: this.serialNumber,
      channel: this.channel,
      status,
    };
    this.logger.error(describeFault(fault));
    this.emit("fault", fault);
  }

  private schedule(delaySeconds: number, callback: () => void): void {
    this.cancelScheduled();
    const token = this.runtime.commandToken;
    this.timer = setTimeout(() => {
      if (token !== this.runtime.commandToken) {
        this.logger.debug(
          `Channel ${this.channel}: ignoring superseded scheduled callback`
        );
        return;
      }
      this.timer = null;
      callback();
      this.changed();
    }, delaySeconds * 1000);
  }

  private cancelScheduled(): void {
    this.runtime.commandToken++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private changed(): void {
    try {
      this.emit("change", { state: this.getState() });
    } catch (err) {
      this.logger.error(
        `Channel ${this.channel}: change listener failed: ${
          err instanceof Error ? err.stack : String(err)
        }`
      );
    }
  }
}

export default CoverController;
