import fs from 'fs/promises';
import path from 'path';
import { getDocument, Util, type PDFDocumentProxy, type PDFPageProxy } from 'pdfjs-dist';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { PositionedTextItem, PositionedTextLayer, TextRun } from '../locator/textLayer';
import { errorMessage, UnreadableDocumentError } from './errors';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  width: number;
  height: number;
  layer: PositionedTextLayer;
}

type PageViewport = ReturnType<PDFPageProxy['getViewport']>;

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

// Standard 14 fonts are read from the package instead of fetched
const STANDARD_FONT_DATA_URL =
  path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts') + path.sep;

function runFromAdvance(dx: number, dy: number): TextRun {
  if (Math.abs(dx) >= Math.abs(dy)) {
    return dx >= 0 ? 'ltr' : 'rtl';
  }
  return dy > 0 ? 'ttb' : 'btt';
}

// Maps an item from PDF space into the viewport (top-left origin, page box
// offset and /Rotate applied) the same way pdf.js lays out its text layer:
// the transformed matrix gives the baseline origin, the advance direction
// and the "up" vector whose length is the font height.
function toPositionedItem(item: TextItem, viewport: PageViewport): PositionedTextItem {
  const [a, b, c, d, e, f] = Util.transform(viewport.transform, item.transform).map(Number);
  const advanceScale = Math.hypot(a, b) || 1;
  const length = item.width * viewport.scale;
  const advance = { x: (a / advanceScale) * length, y: (b / advanceScale) * length };
  const up = Math.hypot(c, d) > 0 ? { x: c, y: d } : { x: 0, y: -item.height * viewport.scale };

  const xs = [e, e + advance.x, e + up.x, e + advance.x + up.x];
  const ys = [f, f + advance.y, f + up.y, f + advance.y + up.y];
  const x = Math.min(...xs);
  const y = Math.min(...ys);
  return {
    str: item.str,
    x,
    y,
    width: Math.max(...xs) - x,
    height: Math.max(...ys) - y,
    hasEOL: item.hasEOL,
    run: runFromAdvance(a, b),
  };
}

export function getFileExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

/**
 * Reads a PDF into one entry per page, in page order, each with its text and
 * positioned text layer. Throws `UnreadableDocumentError` when the file is
 * not a readable PDF or holds no extractable text at all.
 */
export async function extractPages(filePath: string): Promise<ExtractedPage[]> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    throw new UnreadableDocumentError(`Could not read the uploaded file: ${errorMessage(error)}`);
  }

  const parseStartTime = Date.now();
  let pdf: PDFDocumentProxy;
  try {
    pdf = await getDocument({
      data,
      disableFontFace: true,
      isEvalSupported: false,
      standardFontDataUrl: STANDARD_FONT_DATA_URL,
    }).promise;
  } catch (error) {
    throw new UnreadableDocumentError(`The uploaded file is not a readable PDF: ${errorMessage(error)}`);
  }

  try {
    const pages: ExtractedPage[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const viewport = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();
      const items = content.items.filter(isTextItem).map(item => toPositionedItem(item, viewport));
      const layer = new PositionedTextLayer(items);
      pages.push({ pageNumber, text: layer.text, width: viewport.width, height: viewport.height, layer });
      page.cleanup();
    }
    console.log(`PDF parsing completed in ${Date.now() - parseStartTime}ms (${pages.length} page(s))`);

    if (pages.length > 0 && pages.every(page => page.text.length === 0)) {
      throw new UnreadableDocumentError(
        `PDF appears to be a scanned document or image-based PDF (${pages.length} page(s)). ` +
          'Please use a PDF with selectable text, or convert scanned PDFs to text using OCR.'
      );
    }
    return pages;
  } finally {
    await pdf.destroy();
  }
}
