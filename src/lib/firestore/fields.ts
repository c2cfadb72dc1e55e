import { Timestamp, type DocumentData } from "firebase-admin/firestore";

export const COLLECTIONS = {
  materials: "studyMaterials",
  chunks: "documentChunks",
  sessions: "retrievalSessions",
  exams: "mockExams",
  questions: "questions",
  attempts: "mockExamAttempts",
  answers: "answers",
  attemptLocks: "activeAttemptLocks",
  activityLog: "activityLog",
  profiles: "userProfiles",
  feedback: "aiFeedback",
  reviewFlagEvents: "reviewFlagEvents",
} as const;

// Firestore write batches cap at 500 operations
export const BATCH_LIMIT = 400;
export const FIRESTORE_IN_LIMIT = 30;

export function compositeId(...parts: string[]): string {
  return parts.map((part) => encodeURIComponent(part)).join("__");
}

export function chunkArray<T>(items: T[], size: number): T[][] {
  const groups: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    groups.push(items.slice(i, i + size));
  }
  return groups;
}

export function isAlreadyExistsError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === 6 || error.code === "already-exists";
}

export function readString(data: DocumentData, key: string, fallback = ""): string {
  const value: unknown = data[key];
  return typeof value === "string" ? value : fallback;
}

export function readOptionalString(data: DocumentData, key: string): string | undefined {
  const value: unknown = data[key];
  return typeof value === "string" && value ? value : undefined;
}

export function readNumber(data: DocumentData, key: string, fallback = 0): number {
  const value: unknown = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function readBoolean(data: DocumentData, key: string): boolean {
  return data[key] === true;
}

export function readStringArray(data: DocumentData, key: string): string[] {
  const value: unknown = data[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

export function readStringRecord(data: DocumentData, key: string): Record<string, string> | undefined {
  const value: unknown = data[key];
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  const entries = Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === "string");
  return entries.length ? Object.fromEntries(entries) : undefined;
}

export function readTimestamp(data: DocumentData, key: string): string {
  const value: unknown = data[key];
  if (value instanceof Timestamp) {
    return value.toDate().toISOString();
  }
  return typeof value === "string" ? value : new Date(0).toISOString();
}

export function toTimestamp(iso: string): Timestamp {
  return Timestamp.fromDate(new Date(iso));
}
