export type { DatasetTables, Matrix, ValidationReport, ValidationResult } from "./domain/types";
export type { DetectionCsv, InjectionCsv, ObjectMetaCsv } from "./ingest/schemas";
export { loadDetections, loadInjections, loadObjectMeta, loadTables } from "./ingest/load";
export { pivotDetections, forwardFill, backwardFill, fillMissing } from "./matrix/pivot";
export { matrixToCsv, writeMatrixCsv } from "./csv/exportMatrix";
export { validateAll } from "./validate";
export { createPipelineReadyData, type PipelineReadyData } from "./pipeline/prepare";
export { DataMetadataSchema, type DataMetadata } from "./pipeline/schemas";
