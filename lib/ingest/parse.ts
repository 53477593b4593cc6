import Papa from "papaparse";
import { z } from "zod";

export type ParseReport<T> = {
  rows: T[];
  columns: string[];
  rowCount: number;
  unknownColumns: string[];
};

type RawRow = Record<string, string | undefined>;

// Parse CSV text with a header row and coerce each row through `schema`.
// Structural problems (extra fields, broken quoting, no header) reject the
// whole parse.
export async function parseCsvText<T extends z.ZodRawShape>(
  text: string,
  schema: z.ZodObject<T>,
  source = "csv"
): Promise<ParseReport<z.infer<z.ZodObject<T>>>> {
  const result = Papa.parse<RawRow>(text, {
    header: true,
    delimiter: ",",
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const fatal = result.errors.find(
    (e) => e.code === "TooManyFields" || e.code === "MissingQuotes" || e.code === "InvalidQuotes"
  );
  if (fatal) {
    const where = fatal.row === undefined ? "" : ` row ${fatal.row + 1}`;
    throw new Error(`${source}${where}: ${fatal.message}`);
  }

  const columns = (result.meta.fields ?? []).filter((f) => f !== "");
  if (columns.length === 0) {
    throw new Error(`${source}: no header row`);
  }

  const known = new Set(Object.keys(schema.shape));
  const rows = result.data.map((raw) => schema.parse(raw));

  return {
    rows,
    columns,
    rowCount: result.data.length,
    unknownColumns: columns.filter((c) => !known.has(c)),
  };
}
