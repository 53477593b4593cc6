import type { DetectionCsv, InjectionCsv } from "../ingest/schemas";
import { pivotDetections, shapeOf, sparsityOf } from "../matrix/pivot";
import {
  CRITICAL_DETECTION_COLUMNS,
  DETECTIONS_FILE,
  MAG_MAX,
  MAG_MIN,
  REQUIRED_DETECTION_COLUMNS,
} from "../pipeline/config";

export type ColumnCheck = { ok: boolean; missing: string[] };
export type CompletenessCheck = { ok: boolean; missingValues: number };
export type PivotCheck =
  | { ok: true; shape: [number, number]; sparsity: number }
  | { ok: false; error: string };
export type LabelCheck = { ok: boolean; unmatched: string[] };
export type RangeCheck = { ok: boolean; magOutliers: number; negativeFlux: number };

export function checkColumns(columns: string[]): ColumnCheck {
  const present = new Set(columns);
  const missing = REQUIRED_DETECTION_COLUMNS.filter((c) => !present.has(c));
  return { ok: missing.length === 0, missing };
}

// An absent column parses to null on every row, so it counts as missing throughout
export function checkCompleteness(rows: DetectionCsv[]): CompletenessCheck {
  let missingValues = 0;
  for (const r of rows) {
    for (const col of CRITICAL_DETECTION_COLUMNS) {
      if (r[col] === null) missingValues += 1;
    }
  }
  return { ok: missingValues === 0, missingValues };
}

export function checkPivot(rows: DetectionCsv[]): PivotCheck {
  try {
    const matrix = pivotDetections(rows, "mag", "mean");
    return { ok: true, shape: shapeOf(matrix), sparsity: sparsityOf(matrix) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

export function checkLabels(detections: DetectionCsv[], injections: InjectionCsv[]): LabelCheck {
  const known = new Set<string>();
  for (const inj of injections) {
    if (inj.injection_id !== null) known.add(inj.injection_id);
  }

  const unmatched = new Set<string>();
  for (const d of detections) {
    if (d.is_injection !== 1 || d.injection_id === null) continue;
    if (!known.has(d.injection_id)) unmatched.add(d.injection_id);
  }
  return { ok: unmatched.size === 0, unmatched: Array.from(unmatched) };
}

// Missing values are not outliers; malformed ones are an error
export function checkRanges(rows: DetectionCsv[]): RangeCheck {
  let magOutliers = 0;
  let negativeFlux = 0;
  rows.forEach((r, idx) => {
    if (Number.isNaN(r.mag) || Number.isNaN(r.flux)) {
      const field = Number.isNaN(r.mag) ? "mag" : "flux";
      throw new Error(`${DETECTIONS_FILE} row ${idx + 1}: ${field} is not numeric`);
    }
    if (r.mag !== null && (r.mag < MAG_MIN || r.mag > MAG_MAX)) magOutliers += 1;
    if (r.flux !== null && r.flux < 0) negativeFlux += 1;
  });
  return { ok: magOutliers === 0 && negativeFlux === 0, magOutliers, negativeFlux };
}
