import type { Matrix } from "../domain/types";
import { isDecimalId, type DetectionCsv, type NumericDetectionField } from "../ingest/schemas";

export type Aggregation = "mean" | "max";

export type MatrixKeys = { index: string[]; columns: number[] };

type Acc = { sum: number; count: number; max: number };

// Compares canonical decimal ids digit by digit, without going through a double
function compareDecimalIds(a: string, b: string): number {
  const negA = a.startsWith("-");
  const negB = b.startsWith("-");
  if (negA !== negB) return negA ? -1 : 1;
  const [intA, fracA = ""] = (negA ? a.slice(1) : a).split(".");
  const [intB, fracB = ""] = (negB ? b.slice(1) : b).split(".");
  let cmp = intA.length - intB.length;
  if (cmp === 0) cmp = compareText(intA, intB);
  if (cmp === 0) {
    const width = Math.max(fracA.length, fracB.length);
    cmp = compareText(fracA.padEnd(width, "0"), fracB.padEnd(width, "0"));
  }
  return negA ? -cmp : cmp;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Numeric order when every id is decimal text, text order otherwise
export function sortIds(ids: string[]): string[] {
  const compare = ids.every(isDecimalId) ? compareDecimalIds : compareText;
  return [...ids].sort(compare);
}

/**
 * Reshape detections into an object_id × epoch_day matrix, aggregating
 * `value` per cell. Only cells with at least one non-missing value are
 * keyed, so an object or epoch with no values never appears. Passing
 * `keys` lays the result out on another matrix's rows and columns instead;
 * cells outside those keys are ignored.
 *
 * Throws when an epoch_day or value is present but not numeric.
 */
export function pivotDetections(
  rows: DetectionCsv[],
  value: NumericDetectionField,
  aggregate: Aggregation,
  keys?: MatrixKeys
): Matrix {
  const cells = new Map<string, Map<number, Acc>>();
  const epochs = new Set<number>();

  rows.forEach((r, idx) => {
    if (r.object_id === null || r.epoch_day === null) return;
    if (Number.isNaN(r.epoch_day)) {
      throw new Error(`row ${idx + 1}: epoch_day is not numeric`);
    }
    const v = r[value];
    if (v === null) return;
    if (Number.isNaN(v)) {
      throw new Error(`row ${idx + 1}: ${value} is not numeric`);
    }

    epochs.add(r.epoch_day);
    let byEpoch = cells.get(r.object_id);
    if (!byEpoch) {
      byEpoch = new Map();
      cells.set(r.object_id, byEpoch);
    }
    let acc = byEpoch.get(r.epoch_day);
    if (!acc) {
      acc = { sum: 0, count: 0, max: Number.NEGATIVE_INFINITY };
      byEpoch.set(r.epoch_day, acc);
    }
    acc.sum += v;
    acc.count += 1;
    acc.max = Math.max(acc.max, v);
  });

  const index = keys ? [...keys.index] : sortIds(Array.from(cells.keys()));
  const columns = keys ? [...keys.columns] : Array.from(epochs).sort((a, b) => a - b);
  const values = index.map((id) => {
    const byEpoch = cells.get(id);
    return columns.map((epoch) => {
      const acc = byEpoch?.get(epoch);
      if (!acc) return null;
      return aggregate === "mean" ? acc.sum / acc.count : acc.max;
    });
  });

  return { index, columns, values };
}

export function shapeOf<V>(m: Matrix<V>): [number, number] {
  return [m.index.length, m.columns.length];
}

// Fraction of missing cells; 0 for an empty matrix
export function sparsityOf(m: Matrix): number {
  const [rows, cols] = shapeOf(m);
  const size = rows * cols;
  if (size === 0) return 0;
  let missing = 0;
  for (const row of m.values) {
    for (const v of row) if (v === null) missing += 1;
  }
  return missing / size;
}

// Carry the last observed value forward along each row
export function forwardFill(m: Matrix): Matrix {
  const values = m.values.map((row) => {
    let last: number | null = null;
    return row.map((v) => {
      if (v !== null) last = v;
      return last;
    });
  });
  return { ...m, values };
}

// Fill leading gaps with the next observed value along each row
export function backwardFill(m: Matrix): Matrix {
  const values = m.values.map((row) => {
    let next: number | null = null;
    const out = new Array<number | null>(row.length);
    for (let i = row.length - 1; i >= 0; i--) {
      const v = row[i];
      if (v !== null) next = v;
      out[i] = next;
    }
    return out;
  });
  return { ...m, values };
}

export function fillMissing(m: Matrix, fill: number): Matrix<number> {
  return { ...m, values: m.values.map((row) => row.map((v) => v ?? fill)) };
}

// Mean over every cell; 0 for an empty matrix
export function meanOf(m: Matrix<number>): number {
  let sum = 0;
  let n = 0;
  for (const row of m.values) {
    for (const v of row) {
      sum += v;
      n += 1;
    }
  }
  return n === 0 ? 0 : sum / n;
}
