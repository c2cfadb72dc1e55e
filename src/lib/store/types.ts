/**
 * Persistent records and the repository seams the engines depend on.
 * Firestore implementations live in `@/lib/firestore`; timestamps cross the
 * seam as ISO-8601 strings.
 */

export type IngestionStatus = "pending" | "indexing" | "indexed" | "failed";

export type MaterialFile = {
  name: string;
  url: string;
  extension: string;
};

export type StudyMaterial = {
  id: string;
  ownerId: string;
  courseId: string;
  file: MaterialFile;
  ingestionStatus: IngestionStatus;
  chunkCount: number;
  errorMessage?: string;
  createdAt: string;
};

export type NewStudyMaterial = Pick<StudyMaterial, "ownerId" | "courseId" | "file">;

export type DocumentChunk = {
  id: string;
  materialId: string;
  sequence: number;
  text: string;
  vectorId: string;
  reviewFlagsCount: number;
};

export type ChunkDraft = Pick<DocumentChunk, "sequence" | "text" | "vectorId">;

export type RetrievalSession = {
  id: string;
  userId: string;
  queryText: string;
  usedChunkIds: string[];
  answer: string;
  grounded: boolean;
  createdAt: string;
  expiresAt: string;
};

export type QuestionType = "multiple_choice" | "short_answer" | "essay";

export type MockExamQuestion = {
  id: string;
  order: number;
  type: QuestionType;
  text: string;
  points: number;
  options?: Record<string, string>;
  correctOptionKey?: string;
  groundingChunkId?: string;
};

export type MockExam = {
  id: string;
  title: string;
  courseId?: string;
  questions: MockExamQuestion[];
};

export type MockExamAnswer = {
  questionId: string;
  submittedContent: string;
  awardedPoints: number;
  feedback: string;
};

type AttemptBase = {
  id: string;
  userId: string;
  examId: string;
  startedAt: string;
};

export type InProgressAttempt = AttemptBase & { state: "in_progress" };

export type CompletedAttempt = AttemptBase & {
  state: "completed";
  completedAt: string;
  totalScore: number;
  answers: MockExamAnswer[];
};

export type MockExamAttempt = InProgressAttempt | CompletedAttempt;

export type AttemptState = MockExamAttempt["state"];

export type ActivityKind = "exam_completed" | "material_uploaded";

export type ActivityAward = {
  userId: string;
  eventKind: ActivityKind;
  sourceEntityId: string;
  points: number;
  uploadedMaterials?: number;
};

export type ExamStats = {
  mockExamsCompleted: number;
  averageMockExamScore: number;
};

export type UserProgress = ExamStats & {
  userId: string;
  studyMaterialsUploadedCount: number;
  totalPoints: number;
};

export type AiFeedbackRecord = {
  id: string;
  sessionId: string;
  userId: string;
  rating: number;
  comment?: string;
  aiLowConfidence: boolean;
  contextChunkIds: string[];
  createdAt: string;
};

export type NewAiFeedback = Omit<AiFeedbackRecord, "id" | "createdAt">;

export type MaterialRepository = {
  createMaterial(input: NewStudyMaterial): Promise<StudyMaterial>;
  getMaterial(materialId: string): Promise<StudyMaterial | null>;
  /**
   * Atomically moves a `pending` or `failed` material to `indexing`. Throws
   * `NotFoundError` or, for any other status, `ConcurrencyConflictError`.
   */
  claimForIngestion(materialId: string): Promise<StudyMaterial>;
  updateIngestion(
    materialId: string,
    update: { status: IngestionStatus; chunkCount?: number; errorMessage?: string },
  ): Promise<void>;
};

export type ChunkRepository = {
  /** Writes (or rewrites) the material's chunks; ids are derived from material and sequence. */
  saveChunks(materialId: string, drafts: ChunkDraft[]): Promise<DocumentChunk[]>;
  deleteChunksForMaterial(materialId: string): Promise<number>;
  listChunksForMaterial(materialId: string): Promise<DocumentChunk[]>;
  getChunk(chunkId: string): Promise<DocumentChunk | null>;
  /** Only chunks whose material is `indexed`; missing ids are skipped. */
  findIndexedChunksByVectorIds(vectorIds: string[]): Promise<DocumentChunk[]>;
  /** Atomic +1 on each listed chunk. */
  /**
   * Adds one review flag to each existing chunk on behalf of a feedback record.
   * Resolves false, changing nothing, when that feedback was already applied.
   */
  incrementReviewFlags(feedbackId: string, chunkIds: string[]): Promise<boolean>;
};

export type SessionRepository = {
  saveSession(session: RetrievalSession): Promise<void>;
  getSession(sessionId: string): Promise<RetrievalSession | null>;
};

export type ExamRepository = {
  getExam(examId: string): Promise<MockExam | null>;
};

export type AttemptRepository = {
  /** Throws `ConcurrencyConflictError` when an attempt is active and concurrency is off. */
  startAttempt(input: { userId: string; examId: string; allowConcurrent: boolean }): Promise<InProgressAttempt>;
  getAttempt(attemptId: string): Promise<MockExamAttempt | null>;
  /**
   * Writes every answer, the total and the `completed` state in one atomic
   * unit. Throws `ConcurrencyConflictError` when the attempt already completed.
   */
  completeAttempt(input: {
    attemptId: string;
    answers: MockExamAnswer[];
    totalScore: number;
    completedAt: string;
  }): Promise<CompletedAttempt>;
};

export type LedgerRepository = {
  /**
   * Inserts the activity row and applies its increments atomically. Returns
   * false, and changes nothing, when the row already exists.
   */
  recordAward(award: ActivityAward): Promise<boolean>;
  /** Recounts completed attempts and their mean score from the attempt store. */
  recomputeExamStats(userId: string): Promise<ExamStats>;
  getProgress(userId: string): Promise<UserProgress>;
};

export type FeedbackRepository = {
  createFeedback(input: NewAiFeedback): Promise<AiFeedbackRecord>;
};

export type Repositories = {
  materials: MaterialRepository;
  chunks: ChunkRepository;
  sessions: SessionRepository;
  exams: ExamRepository;
  attempts: AttemptRepository;
  ledger: LedgerRepository;
  feedback: FeedbackRepository;
};
