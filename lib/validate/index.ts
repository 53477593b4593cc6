import type { ValidationReport, ValidationResult } from "../domain/types";
import { loadTables } from "../ingest/load";
import { defaultDataDir } from "../pipeline/config";
import { checkColumns, checkCompleteness, checkLabels, checkPivot, checkRanges } from "./checks";

/**
 * Loads the three dataset tables from `dataDir` and runs every check.
 *
 * Only the column, completeness and pivot checks decide `ok`; label
 * consistency and range sanity are reported without gating it.
 * A pivot failure is captured in the report; any other failure rejects.
 */
export async function validateAll(dataDir: string = defaultDataDir()): Promise<ValidationResult> {
  console.log("Running dataset validation...");

  const { detections, injections } = await loadTables(dataDir);
  let ok = true;

  const columns = checkColumns(detections.columns);
  if (!columns.ok) ok = false;

  const completeness = checkCompleteness(detections.rows);
  if (!completeness.ok) ok = false;

  const pivot = checkPivot(detections.rows);
  if (!pivot.ok) ok = false;

  const labels = checkLabels(detections.rows, injections.rows);
  const ranges = checkRanges(detections.rows);

  const report: ValidationReport = {
    columns_ok: columns.ok,
    missing_columns: columns.missing,
    no_nans: completeness.ok,
    missing_values: completeness.missingValues,
    matrix_ok: pivot.ok,
    ...(pivot.ok
      ? { matrix_shape: pivot.shape, sparsity: pivot.sparsity }
      : { matrix_error: pivot.error }),
    labels_match: labels.ok,
    unmatched_injection_ids: labels.unmatched,
    reasonable_ranges: ranges.ok,
    mag_outliers: ranges.magOutliers,
    negative_flux: ranges.negativeFlux,
  };

  console.log("Validation complete.");
  return { ok, report };
}
