export const DETECTIONS_FILE = "detections.csv";
export const INJECTIONS_FILE = "injections.csv";
export const OBJECT_META_FILE = "object_meta.csv";

export const TIME_SERIES_FILE = "time_series_matrix.csv";
export const LABELS_FILE = "anomaly_labels.csv";
export const METADATA_FILE = "data_metadata.json";
export const DEFAULT_OUTPUT_SUBDIR = "outputs";

export const REQUIRED_DETECTION_COLUMNS = [
  "object_id",
  "epoch_day",
  "mag",
  "flux",
  "mag_err",
  "flux_err",
] as const;

// Must be present on every detection row
export const CRITICAL_DETECTION_COLUMNS = ["object_id", "epoch_day", "mag", "flux"] as const;

export const MAG_MIN = 10;
export const MAG_MAX = 30;

export function defaultDataDir(): string {
  return process.env.PIPELINE_DATA_DIR || process.cwd();
}
