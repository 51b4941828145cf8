import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { EXIT_COMPLETE, EXIT_INCOMPLETE, EXIT_USAGE, main, parseArgs } from "../cli.ts";
import type { CliIO } from "../cli.ts";
import type { BootstrapOverrides } from "../bootstrap.ts";
import { BufferLogger } from "../observability/logger.ts";
import { MockTextEvaluator } from "../evaluation/text-evaluator.ts";
import { buildPdf } from "../document/__tests__/pdf-fixtures.ts";

const RUBRIC_DIR = fileURLToPath(new URL("../../rubrics", import.meta.url));

describe("parseArgs", () => {
  it("parses empty args with defaults", () => {
    expect(parseArgs([])).toEqual({
      file: null,
      dimensions: null,
      partial: false,
      format: "json",
      heuristic: false,
      retries: 0,
      help: false,
    });
  });

  it("parses the report file and every option", () => {
    expect(
      parseArgs(["report.md", "--dimensions", "d6, D7,d6", "--partial", "--format", "markdown", "--heuristic", "--retries", "2"]),
    ).toEqual({
      file: "report.md",
      dimensions: ["D6", "D7"],
      partial: true,
      format: "markdown",
      heuristic: true,
      retries: 2,
      help: false,
    });
  });

  it("parses -h and --help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it.each([
    [["--dimensions"], "--dimensions requires a comma-separated list, e.g. D6,D7"],
    [["--dimensions", ","], "--dimensions requires at least one dimension id"],
    [["--format", "html"], "--format must be one of: json, markdown"],
    [["--retries", "-1"], "--retries must be a non-negative integer"],
    [["--retries", "two"], "--retries must be a non-negative integer"],
    [["a.md", "b.md"], "Unexpected argument: b.md"],
    [["--bogus"], "Unknown flag: --bogus"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe("main", () => {
  let dir: string;
  let reportPath: string;
  let stdout: string[];
  let stderr: string[];

  const REPORT = [
    "The patient deteriorated overnight on the ward.",
    "If the early warning score had been escalated, the outcome would have been different.",
  ].join("\n\n");

  function io(overrides?: BootstrapOverrides, env: Record<string, string> = {}): CliIO {
    return {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      env: { ANTHROPIC_API_KEY: "", RUBRIC_DIR, LOG_LEVEL: "silent", LOG_FORMAT: "json", ...env },
      overrides: { logger: new BufferLogger(), ...overrides },
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "learning-review-"));
    reportPath = join(dir, "incident.md");
    await writeFile(reportPath, REPORT);
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints help and exits 0", async () => {
    expect(await main(["--help"], io())).toBe(EXIT_COMPLETE);
    expect(stdout[0]).toContain("Usage:\n  npm start -- <report-file> [options]");
  });

  it("exits 2 on a usage error", async () => {
    expect(await main(["--bogus"], io())).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe("Error: Unknown flag: --bogus");
  });

  it("exits 2 without a report file", async () => {
    expect(await main([], io())).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe("Error: Provide the path of a report file");
  });

  it("exits 2 when the claude evaluator has no API key", async () => {
    expect(await main([reportPath], io(undefined, { EVALUATOR: "claude" }))).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^Configuration error: ANTHROPIC_API_KEY is required/);
  });

  it("exits 2 when the report file cannot be read", async () => {
    expect(await main([join(dir, "missing.md"), "--heuristic"], io())).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^Error: Cannot read /);
  });

  it("exits 2 for an unknown dimension", async () => {
    expect(await main([reportPath, "--heuristic", "--dimensions", "D99"], io())).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^Rubric error: Unknown dimension "D99"/);
  });

  it("prints a JSON report from the heuristic evaluator", async () => {
    const code = await main([reportPath, "--heuristic", "--dimensions", "D6,D7"], io());

    expect(code).toBe(EXIT_COMPLETE);
    const report: unknown = JSON.parse(stdout.join("\n"));
    expect(report).toMatchObject({
      documentId: "incident",
      dimensions: {
        D6: { tier: "LITTLE", uncertainty: false },
        D7: { tier: "NOT_EVIDENCED", evidence: [] },
      },
      failures: {},
    });
  });

  it("reads a PDF report page by page and cites page numbers", async () => {
    const pdfPath = join(dir, "incident-pdf.pdf");
    await writeFile(
      pdfPath,
      await buildPdf([
        ["The patient deteriorated overnight on the ward."],
        ["If the early warning score had been escalated, the outcome would have been different."],
      ]),
    );

    const code = await main([pdfPath, "--heuristic", "--dimensions", "D6"], io());

    expect(code).toBe(EXIT_COMPLETE);
    const report: unknown = JSON.parse(stdout.join("\n"));
    expect(report).toMatchObject({
      documentId: "incident-pdf",
      dimensions: {
        D6: { tier: "LITTLE", evidence: [{ chunkId: "c02", page: 2, polarity: "negative" }] },
      },
    });
  });

  it("exits 2 when a .pdf file is not a PDF", async () => {
    const pdfPath = join(dir, "broken.pdf");
    await writeFile(pdfPath, "just text");

    expect(await main([pdfPath, "--heuristic"], io())).toBe(EXIT_USAGE);
    expect(stderr[0]).toMatch(/^Error: Could not read .*broken\.pdf as a PDF: /);
  });

  it("prints a markdown report", async () => {
    const code = await main([reportPath, "--heuristic", "--dimensions", "D6", "--format", "markdown"], io());
    expect(code).toBe(EXIT_COMPLETE);
    expect(stdout[0]?.split("\n")[0]).toBe("# Learning review: incident");
  });

  it("exits 1 and names the failed dimension without --partial", async () => {
    const evaluator = new MockTextEvaluator();
    evaluator.setError("D7", new Error("down"));

    const code = await main([reportPath, "--dimensions", "D6,D7"], io({ evaluator }, { EVALUATOR: "heuristic" }));

    expect(code).toBe(EXIT_INCOMPLETE);
    expect(stdout).toEqual([]);
    expect(stderr[0]).toBe("Evaluation failed (D7): COLLABORATOR_UNAVAILABLE: Collaborator failed for D7: down");
  });

  it("exits 1 with the partial report and its failures with --partial", async () => {
    const evaluator = new MockTextEvaluator();
    evaluator.setError("D7", new Error("down"));

    const code = await main(
      [reportPath, "--dimensions", "D6,D7", "--partial"],
      io({ evaluator }, { EVALUATOR: "heuristic" }),
    );

    expect(code).toBe(EXIT_INCOMPLETE);
    const report: unknown = JSON.parse(stdout.join("\n"));
    expect(report).toMatchObject({
      dimensions: { D6: { tier: "SOME" } },
      failures: { D7: { code: "COLLABORATOR_UNAVAILABLE", message: "Collaborator failed for D7: down" } },
    });
  });

  it("recovers an unavailable dimension with --retries", async () => {
    const evaluator = new MockTextEvaluator();
    evaluator.setError("D7", new Error("flaky"), true);

    const code = await main(
      [reportPath, "--dimensions", "D6,D7", "--retries", "2"],
      io({ evaluator }, { EVALUATOR: "heuristic" }),
    );

    expect(code).toBe(EXIT_COMPLETE);
    expect(evaluator.calls.map((c) => c.dimension.id)).toEqual(["D6", "D7", "D7"]);
  });
});
