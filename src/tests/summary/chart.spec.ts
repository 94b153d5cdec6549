import { describe, expect, it } from "vitest";
import { candidateKinds, chartCandidates, shapeChart } from "../../summary/chart";
import type { ColumnMeta } from "../../types";

const numeric = (name: string): ColumnMeta => ({ name, type: "numeric" });

describe("chartCandidates", () => {
  it("offers a map for positions, labelled by platform", () => {
    expect(chartCandidates([numeric("platform_id"), numeric("latitude"), numeric("longitude")], 3)).toEqual([
      { kind: "map", latField: "latitude", lonField: "longitude", labelField: "platform_id" }
    ]);
  });

  it("offers a depth profile for a parameter against pressure", () => {
    const candidates = chartCandidates([numeric("pressure"), numeric("temperature")], 5);
    expect(candidates).toEqual([
      { kind: "profile", xField: "temperature", yField: "pressure" },
      { kind: "scatter", xField: "pressure", yField: "temperature" }
    ]);
  });

  it("offers a line over time", () => {
    const candidates = chartCandidates([{ name: "timestamp", type: "temporal" }, numeric("temperature")], 4);
    expect(candidateKinds(candidates)).toEqual(["line"]);
    expect(candidates[0]).toEqual({ kind: "line", xField: "timestamp", yField: "temperature" });
  });

  it("offers bars for a measure per float", () => {
    expect(chartCandidates([numeric("platform_id"), numeric("avg_temp")], 4)).toEqual([
      { kind: "bar", xField: "platform_id", yField: "avg_temp" }
    ]);
  });

  it("offers nothing for a single row", () => {
    expect(chartCandidates([numeric("latitude"), numeric("longitude")], 1)).toEqual([]);
  });
});

describe("shapeChart", () => {
  it("projects map points and skips rows without a position", () => {
    const chart = shapeChart({ kind: "map", latField: "latitude", lonField: "longitude", labelField: "platform_id" }, [
      { platform_id: 2902746, latitude: -12.5, longitude: 80.25 },
      { platform_id: 2902747, latitude: null, longitude: 81 }
    ]);
    expect(chart).toEqual({ kind: "map", points: [{ lat: -12.5, lon: 80.25, label: "2902746" }] });
  });

  it("writes dates on the x axis as ISO strings", () => {
    const chart = shapeChart({ kind: "line", xField: "timestamp", yField: "temperature" }, [
      { timestamp: new Date("2024-01-01T00:00:00Z"), temperature: 20 },
      { timestamp: new Date("2024-02-01T00:00:00Z"), temperature: null }
    ]);
    expect(chart).toEqual({
      kind: "line",
      xField: "timestamp",
      yField: "temperature",
      points: [{ x: "2024-01-01T00:00:00.000Z", y: 20 }]
    });
  });
});
