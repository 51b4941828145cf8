import { describe, expect, it } from "vitest";
import { createDocument } from "../evaluation-document.ts";
import { findCues, normaliseForMatch, resolveEvidence } from "../evidence-resolver.ts";

describe("normaliseForMatch", () => {
  it("straightens quotes, collapses whitespace and lower-cases", () => {
    expect(normaliseForMatch("  The “Alarm”  wasn’t\n heard ")).toBe(
      "the \"alarm\" wasn't heard",
    );
  });

  it("joins words hyphenated across a line break", () => {
    expect(normaliseForMatch("multi-\ndisciplinary review")).toBe("multidisciplinary review");
  });

  it("applies NFKC compatibility folding", () => {
    expect(normaliseForMatch("ﬁrst")).toBe("first");
  });

  it("returns an empty string for empty input", () => {
    expect(normaliseForMatch("")).toBe("");
  });
});

describe("findCues", () => {
  it("returns the cues that occur in the text", () => {
    expect(findCues("It Would Have been avoided, clearly.", ["would have", "clearly", "unknown"])).toEqual([
      "would have",
      "clearly",
    ]);
  });

  it("matches whole words only", () => {
    expect(
      findCues("Staff interactions were reviewed; the patient showed no improvement.", [
        "actions",
        "improvement action*",
        "interactions",
      ]),
    ).toEqual(["interactions"]);
  });

  it("treats a trailing * as a word stem", () => {
    expect(findCues("The deterioration was escalated late.", ["escalat*", "escalat", "escalated"])).toEqual([
      "escalat*",
      "escalated",
    ]);
  });

  it("matches cues that contain punctuation", () => {
    expect(findCues("We can’t determine the cause; re-circulate the memo.", ["can't determine", "re-circulate"])).toEqual([
      "can't determine",
      "re-circulate",
    ]);
  });

  it("ignores empty cues", () => {
    expect(findCues("anything", [""])).toEqual([]);
  });
});

describe("resolveEvidence", () => {
  const doc = createDocument(
    "r1",
    "The nurse escalated to the registrar.\fThe pump alarm “was silenced” twice.\n\nStaff were interviewed.",
  );

  it("trusts the cited chunk when the quote is in it", () => {
    expect(resolveEvidence(doc, "c02", "the pump alarm \"was silenced\" twice.")).toEqual({
      chunkId: "c02",
      page: 2,
    });
  });

  it("accepts hint variants such as upper case and a prefix", () => {
    expect(resolveEvidence(doc, "Text C03", "staff were interviewed")).toEqual({
      chunkId: "c03",
      page: 2,
    });
  });

  it("repairs a mis-attributed chunk id", () => {
    expect(resolveEvidence(doc, "c03", "escalated to the registrar")).toEqual({
      chunkId: "c01",
      page: 1,
    });
  });

  it("searches every chunk when no hint is given", () => {
    expect(resolveEvidence(doc, undefined, "Staff were interviewed!")).toEqual({
      chunkId: "c03",
      page: 2,
    });
  });

  it("returns null when the quote is nowhere in the document", () => {
    expect(resolveEvidence(doc, "c01", "the patient was discharged")).toBeNull();
  });
});
