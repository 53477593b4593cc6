import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import type { DatasetTables } from "../domain/types";
import { DETECTIONS_FILE, INJECTIONS_FILE, OBJECT_META_FILE } from "../pipeline/config";
import { parseCsvText, type ParseReport } from "./parse";
import {
  DetectionCsvSchema,
  InjectionCsvSchema,
  ObjectMetaCsvSchema,
  type DetectionCsv,
  type InjectionCsv,
  type ObjectMetaCsv,
} from "./schemas";

export async function readCsvFile<T extends z.ZodRawShape>(
  filePath: string,
  schema: z.ZodObject<T>
): Promise<ParseReport<z.infer<z.ZodObject<T>>>> {
  const text = await fs.readFile(filePath, "utf8");
  return parseCsvText(text, schema, path.basename(filePath));
}

export async function loadDetections(dataDir: string): Promise<ParseReport<DetectionCsv>> {
  const rep = await readCsvFile(path.join(dataDir, DETECTIONS_FILE), DetectionCsvSchema);
  if (rep.unknownColumns.length > 0) {
    console.warn(`[ingest] ${DETECTIONS_FILE}: ignoring columns ${rep.unknownColumns.join(", ")}`);
  }
  return rep;
}

export async function loadInjections(dataDir: string): Promise<ParseReport<InjectionCsv>> {
  const rep = await readCsvFile(path.join(dataDir, INJECTIONS_FILE), InjectionCsvSchema);
  if (!rep.columns.includes("injection_id")) {
    throw new Error(`${INJECTIONS_FILE}: missing column injection_id`);
  }
  return rep;
}

// Descriptive attributes only; nothing validates them yet
export function loadObjectMeta(dataDir: string): Promise<ParseReport<ObjectMetaCsv>> {
  return readCsvFile(path.join(dataDir, OBJECT_META_FILE), ObjectMetaCsvSchema);
}

export async function loadTables(dataDir: string): Promise<DatasetTables> {
  const detections = await loadDetections(dataDir);
  const injections = await loadInjections(dataDir);
  const objectMeta = await loadObjectMeta(dataDir);
  return { detections, injections, objectMeta };
}
