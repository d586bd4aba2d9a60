import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { extractPages, getFileExtension } from '../documentProcessor';
import { UnreadableDocumentError } from '../errors';
import { locateAnswer } from '../../locator/fuzzyLocator';
import { PageBoundsSink } from '../../locator/pageBoundsSink';

const SENTENCE = 'A firewall is a network security device.';

interface PageLayout {
  mediaBox: [number, number, number, number];
  rotate?: number;
  x: number;
  y: number;
}

// Minimal one-page PDF showing SENTENCE in 12pt Helvetica with its baseline at (x, y)
function buildPdf(page: PageLayout): Buffer {
  const content = `BT /F1 12 Tf ${page.x} ${page.y} Td (${SENTENCE}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    `<< /Type /Page /Parent 2 0 R /MediaBox [${page.mediaBox.join(' ')}] /Rotate ${page.rotate ?? 0} ` +
      '/Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map(offset => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, 'latin1');
}

describe('getFileExtension', () => {
  it('lowercases the extension', () => {
    expect(getFileExtension('Unit-3 Notes.PDF')).toBe('.pdf');
    expect(getFileExtension('notes')).toBe('');
  });
});

describe('extractPages', () => {
  let dir: string;

  async function writePdf(name: string, page: PageLayout): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, buildPdf(page));
    return filePath;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notes-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('places text in page space with the origin at the top-left corner', async () => {
    const [page] = await extractPages(await writePdf('plain.pdf', { mediaBox: [0, 0, 612, 792], x: 72, y: 700 }));

    expect(page.text).toBe(SENTENCE);
    expect([page.width, page.height]).toEqual([612, 792]);
    const [rect] = page.layer.search(SENTENCE);
    expect(rect.x0).toBeCloseTo(72);
    expect(rect.y0).toBeCloseTo(80);
    expect(rect.y1).toBeCloseTo(92);
    expect(rect.x1).toBeGreaterThan(72);
  });

  it('accounts for a page box that does not start at the origin', async () => {
    const filePath = await writePdf('offset.pdf', { mediaBox: [0, 200, 612, 992], x: 72, y: 900 });

    const [page] = await extractPages(filePath);

    const [rect] = page.layer.search(SENTENCE);
    expect(rect.x0).toBeCloseTo(72);
    expect(rect.y0).toBeCloseTo(80);
    expect(rect.y1).toBeCloseTo(92);
    const sink = new PageBoundsSink(page.width, page.height);
    expect(locateAnswer(page.layer, SENTENCE, { sink, splitter: null })).toHaveLength(1);
    expect(sink.marked).toHaveLength(1);
  });

  it('follows the page rotation', async () => {
    const filePath = await writePdf('rotated.pdf', { mediaBox: [0, 0, 612, 792], rotate: 90, x: 72, y: 700 });

    const [page] = await extractPages(filePath);

    expect([page.width, page.height]).toEqual([792, 612]);
    const [rect] = page.layer.search(SENTENCE);
    expect(rect.x0).toBeCloseTo(700);
    expect(rect.x1).toBeCloseTo(712);
    expect(rect.y0).toBeCloseTo(72);
    expect(rect.y1).toBeLessThanOrEqual(612);
    const sink = new PageBoundsSink(page.width, page.height);
    expect(locateAnswer(page.layer, SENTENCE, { sink, splitter: null })).toHaveLength(1);
  });

  it('rejects a missing file as unreadable', async () => {
    await expect(extractPages(path.join(dir, 'missing.pdf'))).rejects.toBeInstanceOf(UnreadableDocumentError);
  });

  it('rejects a file that is not a PDF', async () => {
    const filePath = path.join(dir, 'notes.pdf');
    await fs.writeFile(filePath, 'plain text pretending to be a PDF');

    await expect(extractPages(filePath)).rejects.toThrow(/not a readable PDF/);
  });
});
