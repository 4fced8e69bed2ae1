// ============================================
// PDF text extraction
// ============================================

import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

/**
 * Extract the text of every page, one page per line group.
 * The parsed document is destroyed before returning, including on failure.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const pdf = await getDocument({ data }).promise;

  try {
    const pages: string[] = [];

    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const pageText = content.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");
      pages.push(pageText);
      page.cleanup();
    }

    return pages.join("\n\n");
  } finally {
    await pdf.destroy();
  }
}
