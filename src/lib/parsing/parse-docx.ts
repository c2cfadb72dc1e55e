import JSZip from "jszip";

import { decodeXmlEntities } from "@/lib/parsing/parse-pptx";

export async function parseDocx(buffer: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const xml = await zip.file("word/document.xml")?.async("text");
  if (!xml) {
    return "";
  }

  const paragraphs = Array.from(xml.matchAll(/<w:p[ >][\s\S]*?<\/w:p>/g)).map((paragraph) =>
    Array.from(paragraph[0].matchAll(/<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>/g))
      .map((run) => decodeXmlEntities(run[1] ?? ""))
      .join(""),
  );

  return paragraphs.filter((paragraph) => paragraph.trim()).join("\n\n");
}
