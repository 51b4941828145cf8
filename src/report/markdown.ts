import type { EvidenceItem } from "../types/evaluation.ts";
import { outcomeLabel } from "../types/evaluation.ts";
import type { Report } from "./types.ts";

// ── Markdown Report ─────────────────────────────────────────────────────────

export function renderReportMarkdown(report: Report): string {
  const lines: string[] = [];

  lines.push(`# Learning review: ${report.documentId ?? "untitled report"}`);
  lines.push("");

  if (report.entries.length > 0) {
    lines.push("| Dimension | Rating | Uncertain |");
    lines.push("| --- | --- | --- |");
    for (const entry of report.entries) {
      lines.push(
        `| ${escapeCell(`${entry.dimensionId} ${entry.dimensionName}`)} | ${outcomeLabel(entry.outcome)} | ${entry.uncertainty ? "yes" : "no"} |`,
      );
    }
    lines.push("");
  }

  for (const entry of report.entries) {
    lines.push(`## ${entry.dimensionId}: ${entry.dimensionName}`);
    lines.push("");
    lines.push(`**Rating:** ${outcomeLabel(entry.outcome)}${entry.uncertainty ? " (uncertain)" : ""}`);
    if (entry.outcome.kind === "not_evidenced") {
      lines.push("");
      lines.push(`_${entry.outcome.reason}._`);
    }
    if (entry.rationale) {
      lines.push("");
      lines.push(entry.rationale);
    }
    if (entry.evidence.length > 0) {
      lines.push("");
      lines.push("**Evidence:**");
      lines.push("");
      for (const item of entry.evidence) {
        lines.push(`- ${formatEvidence(item)}`);
      }
    }
    lines.push("");
  }

  if (report.failures.length > 0) {
    lines.push("## Failed dimensions");
    lines.push("");
    for (const failure of report.failures) {
      lines.push(`- **${failure.dimensionId}** (${failure.error.code}): ${failure.error.message}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

function formatEvidence(item: EvidenceItem): string {
  const location = [
    item.polarity,
    item.chunkId ?? "not located",
    ...(item.page !== null ? [`p. ${item.page}`] : []),
  ].join(", ");
  return `(${location}) "${item.quote}"`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
