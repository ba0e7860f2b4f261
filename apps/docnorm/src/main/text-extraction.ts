import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { extractionFailed } from "./errors.js";

/** Text of every page, pages separated by a newline. */
export const extractTextFromPdf = async (bytes: Uint8Array): Promise<string> => {
  // pdf.js detaches the buffer it is given and refuses Node Buffers.
  const loadingTask = getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  });

  try {
    const document = await loadingTask.promise;
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        // Marked-content entries carry no text.
        if (!("str" in item)) continue;
        text += item.hasEOL ? `${item.str}\n` : item.str;
      }
      pages.push(text);
      page.cleanup();
    }
    return pages.join("\n");
  } catch (error) {
    throw extractionFailed(error);
  } finally {
    await loadingTask.destroy();
  }
};
