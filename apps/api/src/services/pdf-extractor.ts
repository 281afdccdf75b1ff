import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { ExtractionError, describeError } from "../lib/errors";

export interface PageText {
  pageIndex: number;
  text: string;
}

async function openDocument(data: Uint8Array) {
  try {
    return await getDocument({
      data,
      isEvalSupported: false,
      useSystemFonts: false,
      disableFontFace: true,
      verbosity: 0,
    }).promise;
  } catch (error) {
    throw new ExtractionError(`Failed to open PDF: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Pull the text of every page out of a PDF, in page order. Pages without
 * text are returned with an empty string so indices stay aligned.
 */
export async function extractPages(bytes: Uint8Array): Promise<PageText[]> {
  // pdf.js may transfer the buffer it is given; keep the caller's intact
  const data = new Uint8Array(bytes);

  const doc = await openDocument(data);

  try {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();

      let buffer = "";
      for (const item of content.items) {
        if (!("str" in item) || !item.str) {
          if ("hasEOL" in item && item.hasEOL) buffer += "\n";
          continue;
        }
        buffer += item.str;
        buffer += item.hasEOL ? "\n" : " ";
      }

      pages.push({ pageIndex: pageNumber - 1, text: buffer });
      page.cleanup();
    }
    return pages;
  } catch (error) {
    throw new ExtractionError(`Failed to read PDF text: ${describeError(error)}`, {
      cause: error,
    });
  } finally {
    await doc.destroy();
  }
}

/**
 * Join page texts into one cleaned string. Each page has its whitespace
 * collapsed and page-number artifacts and underscores removed; pages are
 * separated by a blank line.
 */
export function normalizePages(pages: PageText[]): string {
  return [...pages]
    .sort((a, b) => a.pageIndex - b.pageIndex)
    .map((page) =>
      page.text
        .replace(/\u0000/g, "")
        .replace(/\bPage \d+( of \d+)?\b/g, "")
        .replace(/_/g, " ")
        .replace(/\s+/g, " ")
        .trim()
    )
    .filter((text) => text.length > 0)
    .join("\n\n");
}

/** Extract and normalize in one step; a document with no text is an error. */
export async function extractText(
  bytes: Uint8Array
): Promise<{ pages: PageText[]; text: string }> {
  const pages = await extractPages(bytes);
  const text = normalizePages(pages);
  if (!text) {
    throw new ExtractionError("No text content found in PDF");
  }
  return { pages, text };
}
