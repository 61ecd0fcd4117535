import { describe, it, expect } from "vitest";
import {
  clampPosition,
  estimatePosition,
  moveDuration,
} from "./position-estimator.ts";

describe("estimatePosition", () => {
  it("adds travelled distance while opening", () => {
    expect(estimatePosition(0, 25, 50, "opening")).toBe(50);
    expect(estimatePosition(20, 10, 50, "opening")).toBe(40);
  });

  it("subtracts travelled distance while closing", () => {
    expect(estimatePosition(80, 25, 50, "closing")).toBe(30);
    expect(estimatePosition(100, 5, 20, "closing")).toBe(75);
  });

  it("never leaves the 0-100 range", () => {
    expect(estimatePosition(0, 50, 50, "opening")).toBe(100);
    expect(estimatePosition(0, 500, 50, "opening")).toBe(100);
    expect(estimatePosition(90, 500, 50, "closing")).toBe(0);
  });

  it("credits no movement for zero elapsed time", () => {
    for (const travelTime of [0.5, 12, 50, 300]) {
      expect(estimatePosition(37, 0, travelTime, "opening")).toBe(37);
      expect(estimatePosition(37, 0, travelTime, "closing")).toBe(37);
    }
  });

  it("treats a negative elapsed time as zero", () => {
    expect(estimatePosition(40, -10, 50, "opening")).toBe(40);
  });

  it("is monotonic in elapsed time", () => {
    let lastOpening = -Infinity;
    let lastClosing = Infinity;
    for (let elapsed = 0; elapsed <= 80; elapsed += 2.5) {
      const opening = estimatePosition(10, elapsed, 60, "opening");
      const closing = estimatePosition(90, elapsed, 60, "closing");
      expect(opening).toBeGreaterThanOrEqual(lastOpening);
      expect(closing).toBeLessThanOrEqual(lastClosing);
      lastOpening = opening;
      lastClosing = closing;
    }
  });
});

describe("moveDuration", () => {
  it("scales the travel time by the distance", () => {
    expect(moveDuration(80, 30, 50)).toBe(25);
    expect(moveDuration(30, 80, 50)).toBe(25);
    expect(moveDuration(0, 100, 42)).toBe(42);
    expect(moveDuration(60, 60, 42)).toBe(0);
  });
});

describe("clampPosition", () => {
  it("clamps to the slider range", () => {
    expect(clampPosition(-3)).toBe(0);
    expect(clampPosition(55.5)).toBe(55.5);
    expect(clampPosition(101)).toBe(100);
  });
});
