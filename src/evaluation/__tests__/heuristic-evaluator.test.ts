import { beforeAll, describe, expect, it } from "vitest";
import { CueHeuristicEvaluator } from "../heuristic-evaluator.ts";
import { EvaluationError } from "../types.ts";
import { createDocument } from "../../document/evaluation-document.ts";
import type { RubricRegistry } from "../../rubric/rubric-registry.ts";
import {
  ACTIONS_REPORT,
  HINDSIGHT_REPORT,
  NO_ACTIONS_REPORT,
  WORD_FRAGMENT_REPORT,
  loadShippedRegistry,
  makeDimension,
} from "./fixtures.ts";

const signal = new AbortController().signal;

describe("CueHeuristicEvaluator", () => {
  let registry: RubricRegistry;
  const evaluator = new CueHeuristicEvaluator();

  beforeAll(async () => {
    registry = await loadShippedRegistry();
  });

  it("rates counterfactual certainty as LITTLE for D6", async () => {
    const verdict = await evaluator.evaluate(
      { document: createDocument("r1", HINDSIGHT_REPORT), dimension: registry.get("D6") },
      signal,
    );

    expect(verdict).toEqual({
      tier: "LITTLE",
      rationale:
        "Avoidance of hindsight bias and counterfactual certainty: 1 passage(s) match negative cues (would have) and none match positive cues.",
      evidence: [
        {
          chunkId: "c02",
          quote: "If the early warning score had been escalated, the outcome would have been different.",
          polarity: "negative",
        },
      ],
      uncertainty: false,
    });
  });

  it("rates cautious reasoning as GOOD", async () => {
    const dimension = makeDimension({ positive: ["it is unclear"], negative: ["would have"] });
    const verdict = await evaluator.evaluate(
      { document: createDocument("r", "It is unclear whether earlier review changed anything."), dimension },
      signal,
    );
    expect(verdict.tier).toBe("GOOD");
    expect(verdict.evidence.map((e) => e.polarity)).toEqual(["positive"]);
  });

  it("rates a mix of cues as SOME", async () => {
    const dimension = makeDimension({ positive: ["it is unclear"], negative: ["would have"] });
    const verdict = await evaluator.evaluate(
      {
        document: createDocument("r", "It is unclear what happened first.\n\nA check would have helped."),
        dimension,
      },
      signal,
    );
    expect(verdict.tier).toBe("SOME");
    expect(verdict.rationale).toBe(
      "Test dimension: 1 passage(s) match positive cues (it is unclear) and 1 match negative cues (would have).",
    );
  });

  it("rates SOME with no evidence and declared uncertainty when no cue matches", async () => {
    const dimension = makeDimension({ positive: ["it is unclear"], negative: ["would have"] });
    const verdict = await evaluator.evaluate(
      { document: createDocument("r", "Nothing relevant here."), dimension },
      signal,
    );
    expect(verdict).toEqual({
      tier: "SOME",
      rationale: "Test dimension: no passages match the dimension's cues.",
      evidence: [],
      uncertainty: true,
    });
  });

  it("falls back to the nearest declared tier", async () => {
    const dimension = makeDimension({
      tiers: ["SOME: partial", "LITTLE: weak"],
      positive: ["it is unclear"],
    });
    const verdict = await evaluator.evaluate(
      { document: createDocument("r", "It is unclear."), dimension },
      signal,
    );
    expect(verdict.tier).toBe("SOME");
  });

  it("cites at most three passages per polarity and truncates long sentences", async () => {
    const dimension = makeDimension({ negative: ["would have"] });
    const long = `It would have ${"been very ".repeat(20)}different.`;
    const text = [long, "A would have.", "B would have.", "C would have."].join("\n\n");
    const verdict = await evaluator.evaluate({ document: createDocument("r", text), dimension }, signal);

    expect(verdict.evidence.map((e) => e.chunkId)).toEqual(["c01", "c02", "c03"]);
    expect(verdict.evidence[0]?.quote.split(" ")).toHaveLength(25);
  });

  it("reports the subject absent for D7 when a report has no improvement actions", async () => {
    const verdict = await evaluator.evaluate(
      { document: createDocument("r1", NO_ACTIONS_REPORT), dimension: registry.get("D7") },
      signal,
    );
    expect(verdict).toEqual({
      tier: null,
      rationale: "No improvement actions found in the report.",
      evidence: [],
      subjectPresent: false,
    });
  });

  it("does not read \"interactions\" or \"no improvement\" as D7 actions", async () => {
    const verdict = await evaluator.evaluate(
      { document: createDocument("r1", WORD_FRAGMENT_REPORT), dimension: registry.get("D7") },
      signal,
    );
    expect(verdict).toEqual({
      tier: null,
      rationale: "No improvement actions found in the report.",
      evidence: [],
      subjectPresent: false,
    });
  });

  it("rates system-focused D7 actions as GOOD", async () => {
    const verdict = await evaluator.evaluate(
      { document: createDocument("r1", ACTIONS_REPORT), dimension: registry.get("D7") },
      signal,
    );
    expect(verdict.tier).toBe("GOOD");
    expect(verdict.evidence).toEqual([
      {
        chunkId: "c02",
        quote:
          "The handover workflow will be co-designed with the night team, with a named owner and a monthly audit.",
        polarity: "positive",
      },
    ]);
  });

  it("throws ABORTED when the signal has already fired", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      evaluator.evaluate(
        { document: createDocument("r", HINDSIGHT_REPORT), dimension: registry.get("D6") },
        controller.signal,
      ),
    ).rejects.toBeInstanceOf(EvaluationError);
  });
});
