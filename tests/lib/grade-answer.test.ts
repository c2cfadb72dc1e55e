import { describe, expect, it } from "vitest";

import {
  buildGradingPrompt,
  clampPoints,
  gradeOpenEndedAnswer,
  GRADING_FAILED_FEEDBACK,
  NO_ANSWER_FEEDBACK,
  parseGradingResponse,
} from "@/lib/exams/grade-answer";
import type { MockExamQuestion } from "@/lib/store/types";
import { createFakeModelRouter } from "../support/fakes";

const essay: MockExamQuestion = {
  id: "q1",
  order: 1,
  type: "essay",
  text: "Explain osmosis.",
  points: 10,
};

describe("parseGradingResponse", () => {
  it("reads JSON and clamps to the question maximum", () => {
    expect(parseGradingResponse('{"awardedPoints": 12, "feedback": " Thorough. "}', 10)).toEqual({
      awardedPoints: 10,
      feedback: "Thorough.",
    });
  });

  it("accepts a score field and numeric strings", () => {
    expect(parseGradingResponse('{"score": "4.256"}', 10)).toEqual({ awardedPoints: 4.26, feedback: "" });
  });

  it("clamps negative scores to zero", () => {
    expect(parseGradingResponse("Awarded Points: -3", 10)).toEqual({ awardedPoints: 0, feedback: "" });
  });

  it("reads a bolded plain-text score line", () => {
    expect(parseGradingResponse("**Awarded Points:** 8\n\nSolid answer overall.", 10)).toEqual({
      awardedPoints: 8,
      feedback: "Solid answer overall.",
    });
  });

  it("returns null when no score can be found", () => {
    expect(parseGradingResponse("This answer is pretty good.", 10)).toBeNull();
    expect(parseGradingResponse('{"feedback": "no score"}', 10)).toBeNull();
  });
});

describe("clampPoints", () => {
  it("keeps two decimals", () => {
    expect(clampPoints(3.14159, 5)).toBe(3.14);
  });
});

describe("buildGradingPrompt", () => {
  it("omits the reference block without grounding text", () => {
    const prompt = buildGradingPrompt(essay, "Water moves across a membrane.");

    expect(prompt).not.toContain("REFERENCE MATERIAL");
    expect(prompt.split("\n").slice(0, 6)).toEqual([
      "Question type: essay",
      "Maximum points: 10",
      "",
      "=== QUESTION ===",
      "Explain osmosis.",
      "=== END QUESTION ===",
    ]);
  });
});

describe("gradeOpenEndedAnswer", () => {
  it("awards zero for a blank answer without calling the model", async () => {
    const { router, calls } = createFakeModelRouter(() => '{"awardedPoints": 10}');

    const answer = await gradeOpenEndedAnswer(router, essay, "   ");

    expect(calls).toEqual([]);
    expect(answer).toEqual({ questionId: "q1", submittedContent: "   ", awardedPoints: 0, feedback: NO_ANSWER_FEEDBACK });
  });

  it("routes essays at full complexity", async () => {
    const { router, calls } = createFakeModelRouter(() => '{"awardedPoints": 6}');

    const answer = await gradeOpenEndedAnswer(router, essay, "Diffusion of water.");

    expect(calls[0]?.complexityScore).toBe(1);
    expect(answer).toEqual({
      questionId: "q1",
      submittedContent: "Diffusion of water.",
      awardedPoints: 6,
      feedback: "Graded automatically.",
    });
  });

  it("awards zero when the reply cannot be read", async () => {
    const { router } = createFakeModelRouter(() => "I would give this a decent mark.");

    const answer = await gradeOpenEndedAnswer(router, essay, "Diffusion of water.");

    expect(answer.awardedPoints).toBe(0);
    expect(answer.feedback).toBe(GRADING_FAILED_FEEDBACK);
  });
});
