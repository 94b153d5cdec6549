import type { CellValue, ChartKind, ChartSpec, ColumnMeta, GeoPoint, ResultRow, XYChartKind, XYPoint } from "../types";

export type ChartCandidate =
  | { kind: "map"; latField: string; lonField: string; labelField: string | null }
  | { kind: XYChartKind; xField: string; yField: string };

const LATITUDE_NAMES = ["latitude", "lat"];
const LONGITUDE_NAMES = ["longitude", "lon", "lng"];
const DEPTH_HINTS = ["pressure", "depth"];
const PARAMETER_HINTS = ["temperature", "salinity", "oxygen", "chlorophyll"];
const LABEL_HINTS = ["platform_id", "platform", "float"];

function lower(column: ColumnMeta): string {
  return column.name.toLowerCase();
}

function matchesAny(column: ColumnMeta, hints: readonly string[]): boolean {
  const name = lower(column);
  return hints.some((hint) => name.includes(hint));
}

function isIdentifierColumn(column: ColumnMeta): boolean {
  const name = lower(column);
  return name === "id" || name.endsWith("_id") || name === "cycle_number";
}

function findExact(columns: ColumnMeta[], names: readonly string[]): ColumnMeta | undefined {
  return columns.find((column) => column.type === "numeric" && names.includes(lower(column)));
}

/**
 * Chart shapes that make sense for a result, most specific first. Results
 * with fewer than two rows get none.
 */
export function chartCandidates(columns: ColumnMeta[], rowCount: number): ChartCandidate[] {
  if (rowCount < 2) {
    return [];
  }
  const candidates: ChartCandidate[] = [];

  const latitude = findExact(columns, LATITUDE_NAMES);
  const longitude = findExact(columns, LONGITUDE_NAMES);
  if (latitude && longitude) {
    const label = columns.find((column) => column !== latitude && column !== longitude && matchesAny(column, LABEL_HINTS));
    candidates.push({ kind: "map", latField: latitude.name, lonField: longitude.name, labelField: label?.name ?? null });
  }

  const positional = new Set([latitude, longitude]);
  const measures = columns.filter(
    (column) => column.type === "numeric" && !isIdentifierColumn(column) && !positional.has(column)
  );
  const parameters = measures.filter((column) => matchesAny(column, PARAMETER_HINTS));
  const depth = measures.find((column) => matchesAny(column, DEPTH_HINTS));
  const preferred = [...parameters, ...measures.filter((column) => !parameters.includes(column) && column !== depth)];

  if (depth && parameters.length > 0) {
    candidates.push({ kind: "profile", xField: parameters[0].name, yField: depth.name });
  }

  const time = columns.find((column) => column.type === "temporal");
  if (time && preferred.length > 0) {
    candidates.push({ kind: "line", xField: time.name, yField: preferred[0].name });
  }

  const numericPair = depth ? [depth, ...preferred] : preferred;
  if (numericPair.length >= 2) {
    candidates.push({ kind: "scatter", xField: numericPair[0].name, yField: numericPair[1].name });
  }

  const category = columns.find((column) => column.type === "text" || isIdentifierColumn(column));
  const barMeasure = preferred[0] ?? depth;
  if (category && barMeasure) {
    candidates.push({ kind: "bar", xField: category.name, yField: barMeasure.name });
  }

  return candidates;
}

function asNumber(value: CellValue | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function asAxisValue(value: CellValue | undefined): number | string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  return String(value);
}

/** Projects rows onto a candidate. Rows missing either coordinate are skipped. */
export function shapeChart(candidate: ChartCandidate, rows: ResultRow[]): ChartSpec {
  if (candidate.kind === "map") {
    const points = rows.flatMap((row): GeoPoint[] => {
      const lat = asNumber(row[candidate.latField]);
      const lon = asNumber(row[candidate.lonField]);
      if (lat === null || lon === null) return [];
      const label = candidate.labelField === null ? null : asAxisValue(row[candidate.labelField]);
      return [label === null ? { lat, lon } : { lat, lon, label: String(label) }];
    });
    return { kind: "map", points };
  }

  const points = rows.flatMap((row): XYPoint[] => {
    const x = asAxisValue(row[candidate.xField]);
    const y = asNumber(row[candidate.yField]);
    return x === null || y === null ? [] : [{ x, y }];
  });
  return { kind: candidate.kind, xField: candidate.xField, yField: candidate.yField, points };
}

export function candidateKinds(candidates: readonly ChartCandidate[]): ChartKind[] {
  return candidates.map((candidate) => candidate.kind);
}
