import { parseJsonObject, type ModelRouter } from "@/lib/ai/modelRouter";
import { errorMessage } from "@/lib/errors";
import type { MockExamAnswer, MockExamQuestion } from "@/lib/store/types";

export const NO_ANSWER_FEEDBACK = "No answer was provided.";
export const GRADING_FAILED_FEEDBACK =
  "Automated grading failed, so this answer was awarded 0 points. It can be reviewed manually.";

const MAX_ANSWER_CHARS = 12_000;
const MAX_CONTEXT_CHARS = 6_000;

export type ParsedGrade = {
  awardedPoints: number;
  feedback: string;
};

export function roundPoints(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clampPoints(value: number, maxPoints: number): number {
  return roundPoints(Math.min(Math.max(value, 0), maxPoints));
}

export function gradeMultipleChoice(question: MockExamQuestion, submittedContent: string): MockExamAnswer {
  const submitted = submittedContent.trim();
  const correctKey = question.correctOptionKey?.trim() ?? "";

  if (!submitted) {
    return { questionId: question.id, submittedContent, awardedPoints: 0, feedback: NO_ANSWER_FEEDBACK };
  }

  const correct = correctKey !== "" && submitted === correctKey;
  return {
    questionId: question.id,
    submittedContent,
    awardedPoints: correct ? question.points : 0,
    feedback: correct ? "Correct." : `Incorrect. The correct option is ${correctKey}.`,
  };
}

export function buildGradingPrompt(question: MockExamQuestion, submittedContent: string, groundingText?: string): string {
  const lines = [
    `Question type: ${question.type === "essay" ? "essay" : "short answer"}`,
    `Maximum points: ${question.points}`,
    "",
    "=== QUESTION ===",
    question.text,
    "=== END QUESTION ===",
  ];

  if (groundingText?.trim()) {
    lines.push("", "=== REFERENCE MATERIAL ===", groundingText.trim().slice(0, MAX_CONTEXT_CHARS), "=== END REFERENCE MATERIAL ===");
  }

  lines.push(
    "",
    "=== STUDENT ANSWER ===",
    submittedContent.trim().slice(0, MAX_ANSWER_CHARS),
    "=== END STUDENT ANSWER ===",
    "",
    `Award between 0 and ${question.points} points.`,
    'Respond with JSON only: {"awardedPoints": number, "feedback": "one short paragraph for the student"}',
  );

  return lines.join("\n");
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

const AWARDED_POINTS_LINE = /^\s*\**\s*awarded points\s*\**\s*:\s*\**\s*(-?\d+(?:\.\d+)?)/im;

/**
 * Accepts `{"awardedPoints": n, "feedback": "..."}` (optionally fenced) or a
 * plain-text reply with an `Awarded Points: n` line. Null when no score can
 * be read.
 */
export function parseGradingResponse(raw: string, maxPoints: number): ParsedGrade | null {
  const json = parseJsonObject(raw);
  if (json) {
    const points = toFiniteNumber(json.awardedPoints ?? json.score);
    if (points === null) {
      return null;
    }
    const feedback = typeof json.feedback === "string" ? json.feedback.trim() : "";
    return { awardedPoints: clampPoints(points, maxPoints), feedback };
  }

  const match = raw.match(AWARDED_POINTS_LINE);
  const points = toFiniteNumber(match?.[1]);
  if (!match || points === null) {
    return null;
  }

  const feedback = raw
    .replace(match[0], "")
    .replace(/^\s*\**\s*feedback\s*\**\s*:\s*/im, "")
    .trim();
  return { awardedPoints: clampPoints(points, maxPoints), feedback };
}

/** Never throws: a failed or unreadable grading call yields a zero-point answer. */
export async function gradeOpenEndedAnswer(
  models: ModelRouter,
  question: MockExamQuestion,
  submittedContent: string,
  groundingText?: string,
): Promise<MockExamAnswer> {
  if (!submittedContent.trim()) {
    return { questionId: question.id, submittedContent, awardedPoints: 0, feedback: NO_ANSWER_FEEDBACK };
  }

  try {
    const response = await models.generate({
      taskType: "grade_answer",
      prompt: buildGradingPrompt(question, submittedContent, groundingText),
      complexityScore: question.type === "essay" ? 1 : 0.5,
    });

    const grade = parseGradingResponse(response.text, question.points);
    if (!grade) {
      console.warn("[grading] unparseable grading response", { questionId: question.id });
      return { questionId: question.id, submittedContent, awardedPoints: 0, feedback: GRADING_FAILED_FEEDBACK };
    }

    return {
      questionId: question.id,
      submittedContent,
      awardedPoints: grade.awardedPoints,
      feedback: grade.feedback || "Graded automatically.",
    };
  } catch (error) {
    console.warn("[grading] grading call failed", { questionId: question.id, message: errorMessage(error) });
    return { questionId: question.id, submittedContent, awardedPoints: 0, feedback: GRADING_FAILED_FEEDBACK };
  }
}
