import JSZip from "jszip";

export function decodeXmlEntities(input: string): string {
  return input
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;|&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

/** One paragraph per slide, in slide order. */
export async function parsePptx(buffer: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const slideFiles = Object.keys(zip.files)
    .filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name))
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

  const slides = await Promise.all(
    slideFiles.map(async (slideName) => {
      const xml = await zip.file(slideName)?.async("text");
      if (!xml) {
        return "";
      }

      return Array.from(xml.matchAll(/<a:t>([\s\S]*?)<\/a:t>/g))
        .map((match) => decodeXmlEntities(match[1] ?? "").trim())
        .filter(Boolean)
        .join(" ");
    }),
  );

  return slides.filter(Boolean).join("\n\n");
}
