import { z } from "zod";

import { SUPPORTED_EXTENSIONS } from "@/lib/parsing/types";

const id = z.string().trim().min(1).max(200);

export const askQuestionSchema = z.object({
  question: z.string().trim().min(1, "question is required").max(4_000),
});

export const feedbackSchema = z.object({
  sessionId: id,
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(2_000).optional(),
  aiLowConfidence: z.boolean().optional(),
  contextChunkIds: z.array(id).max(100).optional(),
});

export const registerMaterialSchema = z.object({
  courseId: id,
  file: z.object({
    name: z.string().trim().min(1).max(300),
    url: z.string().url(),
    extension: z
      .string()
      .trim()
      .transform((value) => value.toLowerCase().replace(/^\./, ""))
      .pipe(z.enum(SUPPORTED_EXTENSIONS)),
  }),
});

export const submitAnswersSchema = z.object({
  answers: z
    .array(
      z.object({
        questionId: id,
        submittedContent: z.string().max(20_000),
      }),
    )
    .max(500),
});

export type AskQuestionBody = z.infer<typeof askQuestionSchema>;
export type FeedbackBody = z.infer<typeof feedbackSchema>;
export type RegisterMaterialBody = z.infer<typeof registerMaterialSchema>;
export type SubmitAnswersBody = z.infer<typeof submitAnswersSchema>;
