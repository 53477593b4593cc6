import { promises as fs } from "fs";
import path from "path";
import type { Matrix } from "../domain/types";
import { writeMatrixCsv } from "../csv/exportMatrix";
import { loadDetections } from "../ingest/load";
import { backwardFill, fillMissing, forwardFill, meanOf, pivotDetections, shapeOf } from "../matrix/pivot";
import {
  DEFAULT_OUTPUT_SUBDIR,
  LABELS_FILE,
  METADATA_FILE,
  TIME_SERIES_FILE,
  defaultDataDir,
} from "./config";
import { DataMetadataSchema, type DataMetadata } from "./schemas";

export type PipelineReadyData = {
  timeSeries: Matrix;
  labels: Matrix<number>;
  metadata: DataMetadata;
};

/**
 * Builds the filled mean-magnitude matrix and the injection label matrix
 * from `detections.csv`, writes both plus `data_metadata.json` under
 * `outputDir` (default `<dataDir>/outputs`), and returns them.
 *
 * Files are written one after another; a failure leaves earlier ones in place.
 */
export async function createPipelineReadyData(
  dataDir: string = defaultDataDir(),
  outputDir?: string
): Promise<PipelineReadyData> {
  console.log("Creating pipeline-ready data files...");

  const outDir = outputDir ?? path.join(dataDir, DEFAULT_OUTPUT_SUBDIR);
  await fs.mkdir(outDir, { recursive: true });

  const { rows } = await loadDetections(dataDir);

  const timeSeries = backwardFill(forwardFill(pivotDetections(rows, "mag", "mean")));
  await writeMatrixCsv(path.join(outDir, TIME_SERIES_FILE), timeSeries);

  // Same rows and columns as the time series; cells without a flag are 0
  const labels = fillMissing(pivotDetections(rows, "is_injection", "max", timeSeries), 0);
  await writeMatrixCsv(path.join(outDir, LABELS_FILE), labels);

  const [nObjects, nTimestamps] = shapeOf(timeSeries);
  const metadata = DataMetadataSchema.parse({
    n_objects: nObjects,
    n_timestamps: nTimestamps,
    anomaly_rate: meanOf(labels),
    data_type: "time_series",
    source: "uploaded_dataset",
  });
  await fs.writeFile(path.join(outDir, METADATA_FILE), JSON.stringify(metadata, null, 2), "utf8");

  console.log("Pipeline-ready data created.");
  return { timeSeries, labels, metadata };
}
