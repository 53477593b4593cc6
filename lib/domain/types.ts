// Domain models for the detection dataset and its pipeline outputs

import type { DetectionCsv, InjectionCsv, ObjectMetaCsv } from "../ingest/schemas";
import type { ParseReport } from "../ingest/parse";

// null = missing cell
export type Matrix<V = number | null> = {
  index: string[]; // object_id, sorted
  columns: number[]; // epoch_day, ascending
  values: V[][]; // values[row][col]
};

export type DatasetTables = {
  detections: ParseReport<DetectionCsv>;
  injections: ParseReport<InjectionCsv>;
  objectMeta: ParseReport<ObjectMetaCsv>;
};

export type ValidationReport = {
  columns_ok: boolean;
  missing_columns: string[];
  no_nans: boolean;
  missing_values: number;
  matrix_ok: boolean;
  matrix_shape?: [number, number];
  sparsity?: number;
  matrix_error?: string;
  labels_match: boolean;
  unmatched_injection_ids: string[];
  reasonable_ranges: boolean;
  mag_outliers: number;
  negative_flux: number;
};

export type ValidationResult = {
  ok: boolean;
  report: ValidationReport;
};
