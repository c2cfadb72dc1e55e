import { errorMessage, PermanentProviderError } from "@/lib/errors";
import { parseDocx } from "@/lib/parsing/parse-docx";
import { parsePdf } from "@/lib/parsing/parse-pdf";
import { parsePptx } from "@/lib/parsing/parse-pptx";
import { SUPPORTED_EXTENSIONS, type SupportedExtension } from "@/lib/parsing/types";
import type { MaterialFile } from "@/lib/store/types";

export function extensionFromFile(file: MaterialFile): string {
  return file.extension.toLowerCase().replace(/^\./, "");
}

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

// Strips control characters that break prompts; keeps tabs and newlines.
export function sanitizeExtractedText(input: string): string {
  return input
    .replace(/\r\n?/g, "\n")
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g, " ")
    .replace(/�/g, " ");
}

async function parseBuffer(extension: SupportedExtension, buffer: Buffer): Promise<string> {
  switch (extension) {
    case "pdf":
      return parsePdf(buffer);
    case "docx":
      return parseDocx(buffer);
    case "pptx":
      return parsePptx(buffer);
    case "txt":
    case "md":
      return buffer.toString("utf8");
  }
}

export async function extractMaterialText(file: MaterialFile): Promise<string> {
  const extension = extensionFromFile(file);
  if (!isSupportedExtension(extension)) {
    throw new PermanentProviderError("parse_failed", `${file.name}: unsupported format (${extension})`);
  }

  const response = await fetch(file.url).catch((error: unknown) => {
    throw new PermanentProviderError("parse_failed", `${file.name}: failed to fetch file: ${errorMessage(error)}`);
  });
  if (!response.ok) {
    throw new PermanentProviderError("parse_failed", `${file.name}: failed to fetch file (${response.status})`);
  }

  const buffer = Buffer.from(await response.arrayBuffer());

  try {
    return sanitizeExtractedText(await parseBuffer(extension, buffer));
  } catch (error) {
    throw new PermanentProviderError("parse_failed", `${file.name}: parser could not extract text: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
