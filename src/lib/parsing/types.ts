import type { MaterialFile } from "@/lib/store/types";

export const SUPPORTED_EXTENSIONS = ["pdf", "docx", "pptx", "txt", "md"] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

/** Fetches a stored file and returns its plain text. Failures are permanent. */
export type DocumentParser = (file: MaterialFile) => Promise<string>;
