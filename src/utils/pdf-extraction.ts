import { getDocument, PDFDocumentProxy } from "pdfjs-dist/legacy/build/pdf.mjs";

/**
 * Extracts the text of every page of a PDF, one line per page.
 * Throws whatever pdf.js throws for data that is not a readable PDF.
 */
export async function extractTextFromPDF(data: Uint8Array): Promise<string> {
  const pdfDocument = getDocument({ data, isEvalSupported: false });
  const pdf: PDFDocumentProxy = await pdfDocument.promise;
  const pages: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();

      const pageText = textContent.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");

      pages.push(pageText);
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join("\n");
}

/**
 * Collapses runs of spaces and tabs, trims every line and squeezes blank
 * lines so extracted and pasted documents look alike.
 */
export function normalizeDocumentText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
