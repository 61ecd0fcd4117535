import { describe, it, expect, beforeEach } from "vitest";
import {
  type CoverRuntimeState,
  createRuntimeState,
} from "./cover-runtime-state.ts";
import { reconcile } from "./status-reconciler.ts";

const NOW = 1_700_000_000_000;

describe("reconcile", () => {
  let state: CoverRuntimeState;

  beforeEach(() => {
    state = createRuntimeState(50);
  });

  it.each([
    ["top_position_stop", "open", 100, 50, false],
    ["bottom_position_stop", "closed", 0, 50, true],
    ["intermediate_position_stop", "intermediate", 75, 75, false],
    ["tilt_ventilation_position_stop", "ventilation/tilt", 25, 25, false],
    ["top_position_stop_which_is_tilt_position", "ventilation/tilt", 25, 25, false],
    [
      "bottom_position_stop_which_is_intermediate_position",
      "intermediate",
      75,
      75,
      true,
    ],
  ])("settles on %s", (status, label, position, tilt, closed) => {
    state.movement = "closing";
    state.startTime = NOW - 1000;

    const result = reconcile(state, status, NOW);

    expect(result).toEqual({ moving: false, fault: null });
    expect(state.state).toBe(label);
    expect(state.position).toBe(position);
    expect(state.tiltPosition).toBe(tilt);
    expect(state.closed).toBe(closed);
    expect(state.lastKnownPosition).toBe(position);
    expect(state.tmpPosition).toBe(position);
    expect(state.movement).toBe("idle");
    expect(state.startTime).toBeUndefined();
    expect(state.lastStatus).toBe(status);
  });

  it.each([
    ["start_to_move_up", "opening", 100],
    ["moving_up", "opening", 100],
    ["start_to_move_down", "closing", 0],
    ["moving_down", "closing", 0],
  ] as const)("tracks motion on %s", (status, direction, position) => {
    state.startTime = NOW;

    const result = reconcile(state, status, NOW + 500);

    expect(result).toEqual({ moving: true, fault: null });
    expect(state.state).toBe(direction);
    expect(state.movement).toBe(direction);
    expect(state.position).toBe(position);
    expect(state.tiltPosition).toBe(50);
    expect(state.closed).toBe(false);
    expect(state.startTime).toBe(NOW);
  });

  it("leaves the position to a pending set-position move", () => {
    state.position = 80;
    state.lastKnownPosition = 80;
    state.lastOperation = "set_position";

    reconcile(state, "moving_down", NOW);

    expect(state.position).toBe(80);
    expect(state.lastKnownPosition).toBe(80);
    expect(state.movement).toBe("closing");
  });

  it("estimates the position when stopped in an undefined position", () => {
    state.movement = "opening";
    state.tmpPosition = 0;
    state.position = 100;
    state.startTime = NOW - 25_000;

    reconcile(state, "stopped_in_undefined_position", NOW);

    expect(state.state).toBe("stopped");
    expect(state.position).toBe(50);
    expect(state.tmpPosition).toBe(50);
    expect(state.lastKnownPosition).toBe(50);
    expect(state.closed).toBe(false);
    expect(state.tiltPosition).toBe(50);
    expect(state.movement).toBe("idle");
  });

  it("labels an estimate at an end stop as open or closed", () => {
    state.movement = "closing";
    state.tmpPosition = 20;
    state.startTime = NOW - 40_000;

    reconcile(state, "stopped_in_undefined_position", NOW);

    expect(state.position).toBe(0);
    expect(state.state).toBe("closed");
    expect(state.closed).toBe(true);
  });

  it("falls back to the last known position without a motion snapshot", () => {
    state.lastKnownPosition = 35;

    reconcile(state, "stopped_in_undefined_position", NOW);

    expect(state.position).toBe(35);
    expect(state.state).toBe("stopped");
  });

  it("ignores the snapshot of a finished move while resting", () => {
    state.tmpPosition = 0;
    state.lastKnownPosition = 100;

    reconcile(state, "stopped_in_undefined_position", NOW);

    expect(state.position).toBe(100);
    expect(state.state).toBe("open");
    expect(state.closed).toBe(false);
  });

  it("releases the position from a set-position move that ended", () => {
    state.lastOperation = "set_position";
    state.movement = "closing";

    reconcile(state, "bottom_position_stop", NOW);
    expect(state.lastOperation).toBe("none");

    reconcile(state, "moving_up", NOW);
    expect(state.position).toBe(100);
  });

  it("reports an undefined state when no base position is known", () => {
    reconcile(state, "stopped_in_undefined_position", NOW);

    expect(state.state).toBe("undefined");
    expect(state.position).toBeUndefined();
    expect(state.lastKnownPosition).toBeUndefined();
  });

  it("treats no information as fully unknown", () => {
    state.position = 100;
    state.closed = false;
    state.tiltPosition = 50;
    state.tmpPosition = 100;

    const result = reconcile(state, "no_information", NOW);

    expect(result).toEqual({ moving: false, fault: null });
    expect(state.state).toBe("unknown");
    expect(state.position).toBeUndefined();
    expect(state.tiltPosition).toBeUndefined();
    expect(state.closed).toBeUndefined();
    expect(state.tmpPosition).toBeUndefined();
  });

  it.each(["switching_device_switched_on", "switching_device_switched_off"])(
    "resets to unknown without a fault on %s",
    (status) => {
      state.position = 40;

      expect(reconcile(state, status, NOW)).toEqual({
        moving: false,
        fault: null,
      });
      expect(state.state).toBe("unknown");
      expect(state.position).toBeUndefined();
    }
  );

  it.each(["blocking", "overheated", "timeout"])(
    "reports %s as a device fault",
    (status) => {
      state.position = 40;
      state.lastKnownPosition = 40;
      state.closed = false;

      expect(reconcile(state, status, NOW)).toEqual({
        moving: false,
        fault: "device-fault",
      });
      expect(state.state).toBe("unknown");
      expect(state.position).toBeUndefined();
      expect(state.closed).toBeUndefined();
      // the last usable base survives a fault
      expect(state.lastKnownPosition).toBe(40);
    }
  );

  it("reports codes outside the taxonomy as unhandled", () => {
    expect(reconcile(state, "foo", NOW)).toEqual({
      moving: false,
      fault: "unhandled-status",
    });
    expect(state.state).toBe("unknown");
    expect(state.lastStatus).toBe("foo");
  });
});
