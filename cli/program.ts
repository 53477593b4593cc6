/**
 * pipeline-data CLI
 *
 * Usage:
 *   pipeline-data [validate] [--data-dir <dir>] [--json]
 *   pipeline-data prepare [--data-dir <dir>] [--output-dir <dir>]
 */

import { Command } from "commander";
import type { ValidationResult } from "../lib/domain/types";
import { defaultDataDir } from "../lib/pipeline/config";
import { createPipelineReadyData } from "../lib/pipeline/prepare";
import type { DataMetadata } from "../lib/pipeline/schemas";
import { validateAll } from "../lib/validate";

export const CLI_NAME = "pipeline-data";

interface ValidateOptions {
  readonly dataDir: string;
  readonly json?: boolean;
}

interface PrepareOptions {
  readonly dataDir: string;
  readonly outputDir?: string;
}

type Print = (line: string) => void;

export function formatValue(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  return String(value);
}

export function formatValidation(result: ValidationResult): string[] {
  const lines = ["Validation statistics:"];
  for (const [key, value] of Object.entries(result.report)) {
    lines.push(`  ${key}: ${formatValue(value)}`);
  }
  lines.push(`Ready for modeling: ${result.ok}`);
  lines.push("Done.");
  return lines;
}

export function formatMetadata(metadata: DataMetadata): string[] {
  const lines = ["Pipeline metadata:"];
  for (const [key, value] of Object.entries(metadata)) {
    lines.push(`  ${key}: ${formatValue(value)}`);
  }
  return lines;
}

// A failed validation is reported, not signalled through the exit code
async function executeValidate(options: ValidateOptions, print: Print): Promise<void> {
  const result = await validateAll(options.dataDir);
  if (options.json) {
    print(JSON.stringify(result, null, 2));
    return;
  }
  formatValidation(result).forEach((line) => print(line));
}

async function executePrepare(options: PrepareOptions, print: Print): Promise<void> {
  const { metadata } = await createPipelineReadyData(options.dataDir, options.outputDir);
  formatMetadata(metadata).forEach((line) => print(line));
}

export function createProgram(print: Print = (line) => console.log(line)): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .description("Validate detection tables and reshape them into pipeline-ready matrices");

  program
    .command("validate", { isDefault: true })
    .description("Run the dataset consistency checks")
    .option("-d, --data-dir <dir>", "Directory holding the input CSV files", defaultDataDir())
    .option("--json", "Output as JSON")
    .action(async (options: ValidateOptions) => {
      await executeValidate(options, print);
    });

  program
    .command("prepare")
    .description("Write the time-series matrix, label matrix and metadata summary")
    .option("-d, --data-dir <dir>", "Directory holding the input CSV files", defaultDataDir())
    .option("-o, --output-dir <dir>", "Output directory (default: <data-dir>/outputs)")
    .action(async (options: PrepareOptions) => {
      await executePrepare(options, print);
    });

  return program;
}
