/**
 * Command-line options for scripts/scrape-parcels.ts
 */

import { z } from "zod";

export const DEFAULT_OUTPUT_PATH = "data/output/scraped_properties.csv";
export const DEFAULT_CLI_COLUMN = "APN";
export const DEFAULT_BATCH_SIZE = 50;

export const USAGE = `Usage: npm run scrape -- <input.csv> [options]

Options:
  -o, --output <path>   Output CSV file (default: ${DEFAULT_OUTPUT_PATH})
  -c, --column <name>   Column holding the APNs (default: ${DEFAULT_CLI_COLUMN})
  --batch-size <n>      Rows per write when not streaming (default: ${DEFAULT_BATCH_SIZE})
  --no-stream           Write in batches instead of one row at a time
  --delay <ms>          Pause between APNs (default: ASSESSOR_REQUEST_DELAY_MS or 0)
  --quiet               Only log run start/end events
  -h, --help            Show this message`;

export const scrapeCliOptionsSchema = z.object({
  inputFile: z.string().min(1, "Input CSV file is required"),
  output: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
  column: z.string().min(1).default(DEFAULT_CLI_COLUMN),
  batchSize: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  stream: z.boolean().default(true),
  delayMs: z.coerce.number().int().min(0).optional(),
  quiet: z.boolean().default(false),
});

export type ScrapeCliOptions = z.infer<typeof scrapeCliOptionsSchema>;

export type ParsedCliArgs =
  | { kind: "help" }
  | { kind: "run"; options: ScrapeCliOptions }
  | { kind: "error"; message: string };

const VALUE_FLAGS: Record<string, "output" | "column" | "batchSize" | "delayMs"> = {
  "-o": "output",
  "--output": "output",
  "-c": "column",
  "--column": "column",
  "--batch-size": "batchSize",
  "--delay": "delayMs",
};

export function parseScrapeArgs(argv: readonly string[]): ParsedCliArgs {
  const raw: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "--no-stream") {
      raw.stream = false;
      continue;
    }
    if (arg === "--quiet") {
      raw.quiet = true;
      continue;
    }

    // --flag=value
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];

    if (key) {
      const value = flag === arg ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined) {
        return { kind: "error", message: `Option ${flag} expects a value` };
      }
      raw[key] = value;
      continue;
    }

    if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    positional.push(arg);
  }

  if (positional.length > 1) {
    return { kind: "error", message: `Unexpected argument: ${positional[1]}` };
  }

  const result = scrapeCliOptionsSchema.safeParse({ ...raw, inputFile: positional[0] ?? "" });
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") ?? "arguments";
    return { kind: "error", message: `${field}: ${issue?.message ?? "invalid"}` };
  }

  return { kind: "run", options: result.data };
}
