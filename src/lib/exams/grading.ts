import type { ModelRouter } from "@/lib/ai/modelRouter";
import { AccessDeniedError, ConcurrencyConflictError, NotFoundError, ValidationError } from "@/lib/errors";
import { gradeMultipleChoice, gradeOpenEndedAnswer, NO_ANSWER_FEEDBACK, roundPoints } from "@/lib/exams/grade-answer";
import type { EventBus } from "@/lib/progress/events";
import type {
  AttemptRepository,
  ChunkRepository,
  CompletedAttempt,
  ExamRepository,
  MockExam,
  MockExamAnswer,
  MockExamAttempt,
  MockExamQuestion,
} from "@/lib/store/types";

export type SubmittedAnswer = {
  questionId: string;
  submittedContent: string;
};

export type SubmitAnswersInput = {
  userId: string;
  attemptId: string;
  answers: SubmittedAnswer[];
};

export type SubmitAnswersResult = {
  attemptId: string;
  totalScore: number;
  perQuestion: Array<Pick<MockExamAnswer, "questionId" | "awardedPoints" | "feedback">>;
};

export type GradingEngineDeps = {
  exams: ExamRepository;
  attempts: AttemptRepository;
  chunks: ChunkRepository;
  models: ModelRouter;
  bus: EventBus;
  allowConcurrentAttempts: boolean;
  now?: () => Date;
};

export type GradingEngine = {
  startAttempt(input: { userId: string; examId: string }): Promise<{ attemptId: string; state: "in_progress" }>;
  submitAnswers(input: SubmitAnswersInput): Promise<SubmitAnswersResult>;
  getAttempt(input: { userId: string; attemptId: string }): Promise<MockExamAttempt>;
};

function indexSubmission(exam: MockExam, answers: SubmittedAnswer[]): Map<string, string> {
  const known = new Set(exam.questions.map((question) => question.id));
  const submitted = new Map<string, string>();

  for (const answer of answers) {
    if (!known.has(answer.questionId)) {
      throw new ValidationError(`Question ${answer.questionId} is not part of exam ${exam.id}`);
    }
    if (submitted.has(answer.questionId)) {
      throw new ValidationError(`Question ${answer.questionId} was answered more than once`);
    }
    submitted.set(answer.questionId, answer.submittedContent);
  }

  return submitted;
}

/**
 * Attempt lifecycle: none -> in_progress -> completed.
 *
 * Grading runs before the completion write, so no storage transaction is open
 * during model calls. The completion write itself is the serialization point:
 * of two racing submits, one commits and the other gets a conflict.
 */
export function createGradingEngine(deps: GradingEngineDeps): GradingEngine {
  const now = deps.now ?? (() => new Date());

  async function loadOwnedAttempt(userId: string, attemptId: string): Promise<MockExamAttempt> {
    const attempt = await deps.attempts.getAttempt(attemptId);
    if (!attempt) {
      throw new NotFoundError("Attempt not found");
    }
    if (attempt.userId !== userId) {
      throw new AccessDeniedError("Attempt belongs to another user");
    }
    return attempt;
  }

  async function loadGroundingText(question: MockExamQuestion): Promise<string | undefined> {
    if (!question.groundingChunkId) {
      return undefined;
    }
    try {
      const chunk = await deps.chunks.getChunk(question.groundingChunkId);
      return chunk?.text;
    } catch (error) {
      console.warn("[grading] grounding chunk unavailable; grading without it", {
        questionId: question.id,
        chunkId: question.groundingChunkId,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  async function gradeQuestion(question: MockExamQuestion, submittedContent: string | undefined): Promise<MockExamAnswer> {
    if (submittedContent === undefined) {
      return { questionId: question.id, submittedContent: "", awardedPoints: 0, feedback: NO_ANSWER_FEEDBACK };
    }
    if (question.type === "multiple_choice") {
      return gradeMultipleChoice(question, submittedContent);
    }
    return gradeOpenEndedAnswer(deps.models, question, submittedContent, await loadGroundingText(question));
  }

  async function publishCompletion(attempt: CompletedAttempt): Promise<void> {
    const result = await deps.bus.publish({
      kind: "exam_completed",
      attemptId: attempt.id,
      userId: attempt.userId,
      score: attempt.totalScore,
      occurredAt: attempt.completedAt,
    });
    if (result.failures.length) {
      console.error("[grading] completion handlers failed; replay exam_completed to recover", {
        attemptId: attempt.id,
        failures: result.failures,
      });
    }
  }

  return {
    async startAttempt({ userId, examId }) {
      const exam = await deps.exams.getExam(examId);
      if (!exam) {
        throw new NotFoundError("Exam not found");
      }
      if (!exam.questions.length) {
        throw new ValidationError("Exam has no questions");
      }

      const attempt = await deps.attempts.startAttempt({
        userId,
        examId,
        allowConcurrent: deps.allowConcurrentAttempts,
      });
      console.info("[grading] attempt started", { attemptId: attempt.id, examId, userId });
      return { attemptId: attempt.id, state: attempt.state };
    },

    async submitAnswers(input) {
      const attempt = await loadOwnedAttempt(input.userId, input.attemptId);
      if (attempt.state === "completed") {
        throw new ConcurrencyConflictError("Attempt is already completed", { attemptId: attempt.id });
      }

      const exam = await deps.exams.getExam(attempt.examId);
      if (!exam) {
        throw new NotFoundError("Exam not found");
      }

      const submitted = indexSubmission(exam, input.answers);
      const ordered = [...exam.questions].sort((a, b) => a.order - b.order);
      const startedAt = Date.now();

      const answers = await Promise.all(ordered.map((question) => gradeQuestion(question, submitted.get(question.id))));
      const totalScore = roundPoints(answers.reduce((sum, answer) => sum + answer.awardedPoints, 0));

      const completed = await deps.attempts.completeAttempt({
        attemptId: attempt.id,
        answers,
        totalScore,
        completedAt: now().toISOString(),
      });

      console.info("[grading] attempt completed", {
        attemptId: completed.id,
        totalScore,
        questionCount: answers.length,
        latencyMs: Date.now() - startedAt,
      });

      await publishCompletion(completed);

      return {
        attemptId: completed.id,
        totalScore: completed.totalScore,
        perQuestion: completed.answers.map(({ questionId, awardedPoints, feedback }) => ({
          questionId,
          awardedPoints,
          feedback,
        })),
      };
    },

    getAttempt({ userId, attemptId }) {
      return loadOwnedAttempt(userId, attemptId);
    },
  };
}
