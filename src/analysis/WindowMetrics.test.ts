import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/errors";
import { buildSampleTable, uniformTimes } from "../utils/syntheticForcePlate";
import {
  computeWindowMetrics,
  roundTo,
  trapezoidIntegral,
} from "./WindowMetrics";

function table(time: number[], force: number[]) {
  return buildSampleTable({ Time: time, "Force.Fy.1": force });
}

describe("WindowMetrics", () => {
  it.each([
    [5, 0.001],
    [11, 0.01],
    [101, 0.002],
  ])("integrates %i unit samples at %f s to (N-1)·Δt", (n, dt) => {
    const time = Array.from({ length: n }, (_, i) => i * dt);
    const metrics = computeWindowMetrics(
      table(time, new Array<number>(n).fill(1)),
      { startIndex: 0, endIndex: n - 1 },
      "Force.Fy.1",
    );

    expect(metrics.impulse).toBeCloseTo((n - 1) * dt, 9);
    expect(metrics.peakForce).toBe(1);
  });

  it("integrates the magnitude of negative force", () => {
    const metrics = computeWindowMetrics(
      table(uniformTimes(11, 100), new Array<number>(11).fill(-1)),
      { startIndex: 0, endIndex: 10 },
      "Force.Fy.1",
    );

    expect(metrics.impulse).toBeCloseTo(0.1, 9);
    expect(metrics.peakForce).toBe(1);
  });

  it("honours irregular sample spacing", () => {
    const metrics = computeWindowMetrics(
      table([0, 0.1, 0.3, 0.6], [0, 10, 10, -20]),
      { startIndex: 0, endIndex: 3 },
      "Force.Fy.1",
    );

    // 0.5 + 2.0 + 4.5
    expect(metrics.impulse).toBeCloseTo(7, 10);
    expect(metrics.peakForce).toBe(20);
    expect(metrics.rounded).toEqual({ peakForce: 20, impulse: 7 });
    expect(metrics.sampleCount).toBe(4);
  });

  it("only uses the rows inside the window", () => {
    const metrics = computeWindowMetrics(
      table([0, 0.1, 0.3, 0.6], [0, 10, 10, -20]),
      { startIndex: 1, endIndex: 2 },
      "Force.Fy.1",
    );

    expect(metrics.impulse).toBeCloseTo(2, 10);
    expect(metrics.peakForce).toBe(10);
    expect(metrics.startTime).toBe(0.1);
    expect(metrics.endTime).toBe(0.3);
  });

  it("gives zero impulse for a single-sample window", () => {
    const metrics = computeWindowMetrics(
      table([0, 0.1, 0.2], [5, -42.5, 5]),
      { startIndex: 1, endIndex: 1 },
      "Force.Fy.1",
    );

    expect(metrics.impulse).toBe(0);
    expect(metrics.peakForce).toBe(42.5);
    expect(metrics.startTime).toBe(metrics.endTime);
  });

  it("rounds reported values to two decimals", () => {
    const metrics = computeWindowMetrics(
      table([0, 1], [12.345678, 0]),
      { startIndex: 0, endIndex: 1 },
      "Force.Fy.1",
    );

    expect(metrics.peakForce).toBe(12.345678);
    expect(metrics.rounded.peakForce).toBe(12.35);
    expect(metrics.rounded.impulse).toBe(6.17);
  });

  it("rejects windows outside the table", () => {
    const t = table([0, 0.1, 0.2], [1, 2, 3]);

    expect(() =>
      computeWindowMetrics(t, { startIndex: 2, endIndex: 1 }, "Force.Fy.1"),
    ).toThrow(ValidationError);
    expect(() =>
      computeWindowMetrics(t, { startIndex: 0, endIndex: 3 }, "Force.Fy.1"),
    ).toThrow("Invalid window 0-3 for 3 rows");
  });

  describe("helpers", () => {
    it("rounds to two decimals", () => {
      expect(roundTo(12.344, 2)).toBe(12.34);
      expect(roundTo(-3.456, 2)).toBe(-3.46);
    });

    it("integrates a ramp exactly", () => {
      expect(trapezoidIntegral([0, 1, 2], [0, 1, 2], 0, 2)).toBe(2);
    });
  });
});
