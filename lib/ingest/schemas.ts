import { z } from "zod";

// Field values read as missing, after trimming
export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "",
  "NA",
  "N/A",
  "n/a",
  "NaN",
  "nan",
  "-NaN",
  "-nan",
  "NULL",
  "null",
  "None",
  "<NA>",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "1.#IND",
  "-1.#IND",
  "1.#QNAN",
  "-1.#QNAN",
]);

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Plain decimal text, no exponent
const DECIMAL_ID = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const CANONICAL_DECIMAL = /^-?\d+(\.\d+)?$/;

export function isMissingToken(v: string): boolean {
  return MISSING_TOKENS.has(v.trim());
}

/**
 * "5", "5.0" and "05" all name the same id. Normalised as text so ids past
 * 2^53 keep every digit; exponent forms and other text are only trimmed.
 */
export function canonicalId(raw: string): string {
  const s = raw.trim();
  const m = DECIMAL_ID.exec(s);
  if (!m || (m[2] === "" && !m[3])) return s;
  const int = m[2].replace(/^0+/, "") || "0";
  const frac = (m[3] ?? "").replace(/0+$/, "");
  const body = frac ? `${int}.${frac}` : int;
  return m[1] === "-" && body !== "0" ? `-${body}` : body;
}

// True for ids canonicalId reduced to plain decimal text
export function isDecimalId(id: string): boolean {
  return CANONICAL_DECIMAL.test(id);
}

// Helpers
// null = missing, NaN = present but not numeric
const numCell = z
  .string()
  .optional()
  .transform((v): number | null => {
    if (v === undefined || isMissingToken(v)) return null;
    const s = v.trim();
    return NUMERIC_TEXT.test(s) ? Number(s) : Number.NaN;
  });

const idCell = z
  .string()
  .optional()
  .transform((v): string | null => (v === undefined || isMissingToken(v) ? null : canonicalId(v)));

// Row schemas. Every field is optional so a row is never dropped;
// completeness is checked by the validator, not at parse time.
export const DetectionCsvSchema = z.object({
  object_id: idCell,
  epoch_day: numCell,
  mag: numCell,
  flux: numCell,
  mag_err: numCell,
  flux_err: numCell,
  is_injection: numCell,
  injection_id: idCell,
});

export type DetectionCsv = z.infer<typeof DetectionCsvSchema>;

export type NumericDetectionField = "epoch_day" | "mag" | "flux" | "mag_err" | "flux_err" | "is_injection";

export const InjectionCsvSchema = z.object({
  injection_id: idCell,
});

export type InjectionCsv = z.infer<typeof InjectionCsvSchema>;

export const ObjectMetaCsvSchema = z.object({
  object_id: idCell,
});

export type ObjectMetaCsv = z.infer<typeof ObjectMetaCsvSchema>;
