import { promises as fs } from "fs";
import Papa from "papaparse";
import type { Matrix } from "../domain/types";

/**
 * Serializes a matrix to CSV: an `object_id` header cell followed by the
 * epoch values, then one line per object.
 */
export function matrixToCsv(matrix: Matrix<number | null>): string {
  const fields = ["object_id", ...matrix.columns.map(formatCSVValue)];
  const data = matrix.index.map((id, i) => [id, ...matrix.values[i].map(formatCSVValue)]);
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

export async function writeMatrixCsv(filePath: string, matrix: Matrix<number | null>): Promise<void> {
  await fs.writeFile(filePath, matrixToCsv(matrix), "utf8");
}

/**
 * Formats a cell for CSV export; missing cells are left empty
 */
function formatCSVValue(value: number | null): string {
  if (value === null) {
    return "";
  }
  return value.toString();
}
