import { describe, it, expect } from "vitest";
import { chooseCenter, median, robustClusterCenter } from "./centroid";
import { haversineKm } from "../projection/mercator";
import type { MapNode } from "../nodes";

describe("median", () => {
  it("returns 0 for an empty sequence", () => {
    expect(median([])).toBe(0);
  });

  it("returns the middle value for odd lengths", () => {
    expect(median([3, 1, 2])).toBe(2);
  });

  it("averages the two middle values for even lengths", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("sorts numerically and leaves the input untouched", () => {
    const values = [10, 9, 100];
    expect(median(values)).toBe(10);
    expect(values).toEqual([10, 9, 100]);
  });
});

describe("robustClusterCenter", () => {
  it("returns null for no points", () => {
    expect(robustClusterCenter([])).toBeNull();
  });

  it("uses the plain median below four points", () => {
    const center = robustClusterCenter([
      { latitude: 0, longitude: 0 },
      { latitude: 10, longitude: 10 },
      { latitude: 50, longitude: 50 },
    ]);
    expect(center).toEqual({ latitude: 10, longitude: 10 });
  });

  it("returns the median center when the deviation is zero", () => {
    const center = robustClusterCenter([
      { latitude: 1, longitude: 1 },
      { latitude: 1, longitude: 1 },
      { latitude: 1, longitude: 1 },
      { latitude: 20, longitude: 20 },
    ]);
    expect(center).toEqual({ latitude: 1, longitude: 1 });
  });

  it("ignores a far outlier", () => {
    const cluster = { latitude: 37.775, longitude: -122.4194 };
    const center = robustClusterCenter([
      { latitude: 37.774, longitude: -122.4194 },
      cluster,
      { latitude: 37.776, longitude: -122.4194 },
      // roughly 500 km north
      { latitude: 42.27, longitude: -122.4194 },
    ]);
    expect(center).not.toBeNull();
    expect(center!.latitude).toBeCloseTo(37.775, 6);
    expect(center!.longitude).toBeCloseTo(-122.4194, 6);
    expect(haversineKm(center!, cluster)).toBeLessThan(1);
  });

  it("trims an outlier on another continent", () => {
    const center = robustClusterCenter([
      { latitude: 37.774, longitude: -122.419 },
      { latitude: 37.775, longitude: -122.418 },
      { latitude: 37.776, longitude: -122.42 },
      { latitude: 37.777, longitude: -122.421 },
      { latitude: 60, longitude: 10 },
    ]);
    expect(center!.latitude).toBeCloseTo(37.7755, 4);
    expect(center!.longitude).toBeCloseTo(-122.4195, 4);
  });
});

describe("chooseCenter", () => {
  const local: MapNode = {
    nodeId: "!local",
    latitude: 37.7749,
    longitude: -122.4194,
  };
  const berlin: MapNode = { nodeId: "!berlin", latitude: 52.52, longitude: 13.405 };
  const paris: MapNode = { nodeId: "!paris", latitude: 48.8566, longitude: 2.3522 };

  it("returns the preferred node's position regardless of order", () => {
    expect(chooseCenter([berlin, paris, local], "!local")).toEqual({
      latitude: 37.7749,
      longitude: -122.4194,
    });
  });

  it("trims whitespace around the preferred ID", () => {
    expect(chooseCenter([berlin, local], "  !local ")).toEqual({
      latitude: 37.7749,
      longitude: -122.4194,
    });
  });

  it("falls back to the cluster when the preferred node has no position", () => {
    const center = chooseCenter(
      [{ nodeId: "!local" }, berlin, paris],
      "!local"
    );
    expect(center).toEqual({
      latitude: (52.52 + 48.8566) / 2,
      longitude: (13.405 + 2.3522) / 2,
    });
  });

  it("skips nodes with invalid positions", () => {
    const center = chooseCenter([
      { nodeId: "!nan", latitude: NaN, longitude: 10 },
      { nodeId: "!far", latitude: 95, longitude: 10 },
      berlin,
    ]);
    expect(center).toEqual({ latitude: 52.52, longitude: 13.405 });
  });

  it("returns null when no node is positioned", () => {
    expect(chooseCenter([], "!local")).toBeNull();
    expect(chooseCenter([{ nodeId: "!a" }, { nodeId: "!b" }])).toBeNull();
  });
});
