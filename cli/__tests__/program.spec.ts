import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { createProgram, formatValidation, formatValue } from "../program";
import { DETECTION_HEADER, makeTempDir, removeTempDirs, toCsv, writeDataset } from "@/lib/__tests__/dataset";

const sampleDir = path.resolve(__dirname, "../../fixtures/sample");

async function smallDataset(): Promise<string> {
  const dir = await makeTempDir();
  await writeDataset(dir, {
    detections: toCsv(DETECTION_HEADER, [
      [1, 1, "20.0", 100, 0.1, "2.0", 0, ""],
      [1, 2, "21.0", 110, 0.1, "2.0", 1, 5],
      [2, 1, "19.5", 90, 0.1, "2.0", 0, ""],
    ]),
    injections: "injection_id\n5\n",
    objectMeta: "object_id\n1\n2\n",
  });
  return dir;
}

describe("formatting", () => {
  it("formats arrays and scalars", () => {
    expect(formatValue([2, 3])).toBe("[2, 3]");
    expect(formatValue([])).toBe("[]");
    expect(formatValue(0.25)).toBe("0.25");
    expect(formatValue(false)).toBe("false");
  });

  it("prints every report entry and the overall flag", () => {
    const lines = formatValidation({
      ok: false,
      report: {
        columns_ok: false,
        missing_columns: ["flux_err"],
        no_nans: true,
        missing_values: 0,
        matrix_ok: true,
        matrix_shape: [1, 1],
        sparsity: 0,
        labels_match: true,
        unmatched_injection_ids: [],
        reasonable_ranges: true,
        mag_outliers: 0,
        negative_flux: 0,
      },
    });
    expect(lines[0]).toBe("Validation statistics:");
    expect(lines[1]).toBe("  columns_ok: false");
    expect(lines[2]).toBe("  missing_columns: [flux_err]");
    expect(lines[6]).toBe("  matrix_shape: [1, 1]");
    expect(lines.slice(-2)).toEqual(["Ready for modeling: false", "Done."]);
  });
});

describe("pipeline-data program", () => {
  let printed: string[];

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    printed = [];
  });
  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDirs();
  });

  it("validates a directory and prints the report", async () => {
    const dir = await smallDataset();
    await createProgram((line) => printed.push(line)).parseAsync(["validate", "--data-dir", dir], { from: "user" });
    expect(printed).toEqual([
      "Validation statistics:",
      "  columns_ok: true",
      "  missing_columns: []",
      "  no_nans: true",
      "  missing_values: 0",
      "  matrix_ok: true",
      "  matrix_shape: [2, 2]",
      "  sparsity: 0.25",
      "  labels_match: true",
      "  unmatched_injection_ids: []",
      "  reasonable_ranges: true",
      "  mag_outliers: 0",
      "  negative_flux: 0",
      "Ready for modeling: true",
      "Done.",
    ]);
  });

  it("runs validation as the default command and prints JSON", async () => {
    await createProgram((line) => printed.push(line)).parseAsync(["--data-dir", sampleDir, "--json"], {
      from: "user",
    });
    expect(printed).toHaveLength(1);
    const parsed: unknown = JSON.parse(printed[0]);
    expect(parsed).toMatchObject({ ok: true, report: { matrix_shape: [3, 4], labels_match: true } });
  });

  it("prepares pipeline data into the given output directory", async () => {
    const outDir = await makeTempDir();
    await createProgram((line) => printed.push(line)).parseAsync(["prepare", "-d", sampleDir, "-o", outDir], {
      from: "user",
    });
    expect(printed.slice(0, 3)).toEqual(["Pipeline metadata:", "  n_objects: 3", "  n_timestamps: 4"]);
    const metadata: unknown = JSON.parse(await fs.readFile(path.join(outDir, "data_metadata.json"), "utf8"));
    expect(metadata).toMatchObject({ n_objects: 3, n_timestamps: 4, data_type: "time_series" });
  });
});
