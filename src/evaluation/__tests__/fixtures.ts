import { fileURLToPath } from "node:url";
import { RubricRegistry } from "../../rubric/rubric-registry.ts";
import { parseDimensionDocument } from "../../rubric/dimension-parser.ts";
import type { Dimension } from "../../types/rubric.ts";
import { rubricDoc } from "../../rubric/__tests__/helpers.ts";
import type { RubricDocOptions } from "../../rubric/__tests__/helpers.ts";

export const RUBRIC_DIR = fileURLToPath(new URL("../../../rubrics", import.meta.url));

export function loadShippedRegistry(): Promise<RubricRegistry> {
  return RubricRegistry.fromDirectory(RUBRIC_DIR);
}

export function makeDimension(options: RubricDocOptions = {}): Dimension {
  return parseDimensionDocument(rubricDoc(options));
}

export const HINDSIGHT_REPORT = [
  "The patient deteriorated overnight on the ward.",
  "If the early warning score had been escalated, the outcome would have been different.",
].join("\n\n");

export const NO_ACTIONS_REPORT = [
  "This after-action review describes a medication delay on the ward.",
  "The team discussed what happened and how the shift was staffed.",
].join("\n\n");

export const WORD_FRAGMENT_REPORT = [
  "The review looked at staff interactions on the ward and the transactions recorded in the drug log.",
  "The nurse had completed sepsis training in the previous month.",
  "The patient showed no improvement after the first dose.",
].join("\n\n");

export const ACTIONS_REPORT = [
  "Following the review, an action plan was agreed.",
  "The handover workflow will be co-designed with the night team, with a named owner and a monthly audit.",
].join("\n\n");
