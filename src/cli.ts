import { readFile, realpath } from "node:fs/promises";
import { basename, extname } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import type { BootstrapOverrides } from "./bootstrap.ts";
import { RubricError } from "./rubric/errors.ts";
import { EvaluationError } from "./evaluation/types.ts";
import { reportToJSON } from "./report/serialize.ts";
import { renderReportMarkdown } from "./report/markdown.ts";
import { isComplete } from "./report/result-aggregator.ts";
import { createDocument } from "./document/evaluation-document.ts";
import { createPdfDocument } from "./document/pdf-document.ts";
import { DocumentError } from "./document/errors.ts";
import type { EvaluationDocument } from "./types/evaluation.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export const OUTPUT_FORMATS = ["json", "markdown"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ParsedArgs {
  file: string | null;
  dimensions: string[] | null;
  partial: boolean;
  format: OutputFormat;
  heuristic: boolean;
  retries: number;
  help: boolean;
}

export const EXIT_COMPLETE = 0;
export const EXIT_INCOMPLETE = 1;
export const EXIT_USAGE = 2;

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    file: null,
    dimensions: null,
    partial: false,
    format: "json",
    heuristic: false,
    retries: 0,
    help: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--partial") {
      result.partial = true;
      i++;
    } else if (arg === "--heuristic") {
      result.heuristic = true;
      i++;
    } else if (arg === "--dimensions") {
      const value = argv[i + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--dimensions requires a comma-separated list, e.g. D6,D7");
      }
      const ids = value
        .split(",")
        .map((id) => id.trim().toUpperCase())
        .filter((id) => id.length > 0);
      if (ids.length === 0) {
        throw new Error("--dimensions requires at least one dimension id");
      }
      result.dimensions = [...new Set(ids)];
      i += 2;
    } else if (arg === "--format") {
      const value = argv[i + 1];
      const format = OUTPUT_FORMATS.find((f) => f === value);
      if (!format) {
        throw new Error(`--format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
      }
      result.format = format;
      i += 2;
    } else if (arg === "--retries") {
      const value = argv[i + 1];
      const retries = Number(value);
      if (value === undefined || value.trim() === "" || !Number.isInteger(retries) || retries < 0) {
        throw new Error("--retries must be a non-negative integer");
      }
      result.retries = retries;
      i += 2;
    } else if (!arg.startsWith("--")) {
      if (result.file !== null) {
        throw new Error(`Unexpected argument: ${arg}`);
      }
      result.file = arg;
      i++;
    } else {
      throw new Error(`Unknown flag: ${arg}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

const HELP_TEXT = `
learning-review: grade an incident learning report against rubric dimensions

Usage:
  npm start -- <report-file> [options]

  <report-file> is a PDF (chunked per page) or a text/markdown file.

Options:
  --dimensions D6,D7    Evaluate only these dimensions (default: all)
  --partial             Report failed dimensions instead of stopping at the first
  --format json|markdown
                        Output format (default: json)
  --heuristic           Use the offline cue heuristic instead of Claude
  --retries N           Retry dimensions whose collaborator was unavailable
  --help, -h            Show this help message

Exit codes:
  0  every requested dimension was evaluated
  1  one or more dimensions failed
  2  usage or configuration error

Environment:
  EVALUATOR, ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL, EVALUATION_MODEL,
  EVALUATION_MAX_TOKENS, EVALUATION_TIMEOUT_MS, MAX_PARALLEL_EVALUATIONS,
  RUBRIC_DIR, LOG_LEVEL, LOG_FORMAT
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env?: Record<string, string | undefined>;
  readonly signal?: AbortSignal;
  readonly overrides?: BootstrapOverrides;
}

const PROCESS_IO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/** Run the CLI and return its exit code. */
export async function main(argv: readonly string[], io: CliIO = PROCESS_IO): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err: unknown) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    io.stderr("Run with --help for usage information.");
    return EXIT_USAGE;
  }

  if (args.help) {
    io.stdout(HELP_TEXT);
    return EXIT_COMPLETE;
  }

  if (args.file === null) {
    io.stderr("Error: Provide the path of a report file");
    io.stderr(HELP_TEXT);
    return EXIT_USAGE;
  }

  let config: RuntimeConfig;
  try {
    config = loadConfig({
      ...io.env,
      ...(args.heuristic ? { EVALUATOR: "heuristic" } : {}),
    });
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      io.stderr(`Configuration error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const documentId = basename(args.file, extname(args.file));
  let document: EvaluationDocument;
  try {
    document = await loadReport(args.file, documentId);
  } catch (err: unknown) {
    io.stderr(
      err instanceof DocumentError
        ? `Error: ${err.message}`
        : `Error: Cannot read ${args.file}: ${err instanceof Error ? err.message : String(err)}`,
    );
    return EXIT_USAGE;
  }

  try {
    const app = await bootstrap(config, io.overrides);

    const report = await app.reviewDocument(document, {
      ...(args.dimensions ? { dimensionIds: args.dimensions } : {}),
      allowPartial: args.partial,
      retries: args.retries,
      ...(io.signal ? { signal: io.signal } : {}),
    });

    io.stdout(
      args.format === "markdown"
        ? renderReportMarkdown(report)
        : JSON.stringify(reportToJSON(report), null, 2),
    );

    return isComplete(report) ? EXIT_COMPLETE : EXIT_INCOMPLETE;
  } catch (err: unknown) {
    if (err instanceof RubricError) {
      io.stderr(`Rubric error: ${err.message}`);
      return EXIT_USAGE;
    }
    if (err instanceof EvaluationError) {
      const where = err.dimensionId ? ` (${err.dimensionId})` : "";
      io.stderr(`Evaluation failed${where}: ${err.code}: ${err.message}`);
      return EXIT_INCOMPLETE;
    }
    throw err;
  }
}

/** PDF reports are chunked per page; anything else is read as text. */
async function loadReport(path: string, documentId: string): Promise<EvaluationDocument> {
  if (extname(path).toLowerCase() === ".pdf") {
    return createPdfDocument(documentId, new Uint8Array(await readFile(path)), path);
  }
  return createDocument(documentId, await readFile(path, "utf-8"));
}

async function isEntryPoint(): Promise<boolean> {
  const entry = process.argv[1];
  if (!entry) return false;
  const resolved = await realpath(entry).catch(() => entry);
  return resolved === fileURLToPath(import.meta.url);
}

if (await isEntryPoint()) {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    process.exitCode = await main(process.argv.slice(2), {
      ...PROCESS_IO,
      signal: controller.signal,
    });
  } catch (err: unknown) {
    console.error("Fatal error:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}
