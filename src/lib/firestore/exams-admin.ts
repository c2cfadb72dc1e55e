import type { DocumentData, Firestore } from "firebase-admin/firestore";

import {
  COLLECTIONS,
  readNumber,
  readOptionalString,
  readString,
  readStringRecord,
} from "@/lib/firestore/fields";
import type { ExamRepository, MockExamQuestion, QuestionType } from "@/lib/store/types";

const QUESTION_TYPES: readonly QuestionType[] = ["multiple_choice", "short_answer", "essay"];

function toQuestion(id: string, data: DocumentData): MockExamQuestion | null {
  const type = QUESTION_TYPES.find((candidate) => candidate === data.type);
  if (!type) {
    console.warn("[grading] skipping question with unknown type", { questionId: id, type: String(data.type) });
    return null;
  }

  return {
    id,
    order: readNumber(data, "order"),
    type,
    text: readString(data, "text"),
    points: Math.max(0, readNumber(data, "points")),
    options: readStringRecord(data, "options"),
    correctOptionKey: readOptionalString(data, "correctOptionKey"),
    groundingChunkId: readOptionalString(data, "groundingChunkId"),
  };
}

export function createFirestoreExamRepository(db: Firestore): ExamRepository {
  const exams = db.collection(COLLECTIONS.exams);

  return {
    async getExam(examId) {
      const examRef = exams.doc(examId);
      const [examSnapshot, questionSnapshot] = await Promise.all([
        examRef.get(),
        examRef.collection(COLLECTIONS.questions).orderBy("order").get(),
      ]);

      const data = examSnapshot.data();
      if (!data) {
        return null;
      }

      return {
        id: examSnapshot.id,
        title: readString(data, "title"),
        courseId: readOptionalString(data, "courseId"),
        questions: questionSnapshot.docs
          .map((doc) => toQuestion(doc.id, doc.data()))
          .filter((question): question is MockExamQuestion => question !== null),
      };
    },
  };
}
