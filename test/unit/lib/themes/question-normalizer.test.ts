import { describe, it, expect } from "vitest";
import { normalizeCanonicalQuestions, normalizeQuestionKey } from "@/lib/themes/question-normalizer";
import { GUIDE_QUESTIONS } from "@test/helpers/quote-fixtures";

describe("normalizeCanonicalQuestions", () => {
  it("keeps the first occurrence per normalized key", () => {
    const result = normalizeCanonicalQuestions(["What is X?", "what is x", "  ", "Why Y?"]);
    expect(result.questions).toEqual(["What is X?", "Why Y?"]);
    expect(result.aliases.get("what is x")).toBe("What is X?");
    expect(result.aliases.get("What is X?")).toBe("What is X?");
    expect(result.aliases.has("  ")).toBe(false);
  });

  it("returns an empty list for empty input", () => {
    const result = normalizeCanonicalQuestions([]);
    expect(result.questions).toEqual([]);
    expect(result.aliases.size).toBe(0);
  });

  it("is idempotent", () => {
    const once = normalizeCanonicalQuestions([...GUIDE_QUESTIONS, GUIDE_QUESTIONS[2].toUpperCase(), " Why Y? "]);
    const twice = normalizeCanonicalQuestions(once.questions);
    expect(twice.questions).toEqual(once.questions);
  });

  it("trims the surviving representative", () => {
    expect(normalizeCanonicalQuestions(["  Why Y?  "]).questions).toEqual(["Why Y?"]);
  });

  it("normalizes keys without punctuation or case", () => {
    expect(normalizeQuestionKey("Why, Y?")).toBe("why y");
  });
});
