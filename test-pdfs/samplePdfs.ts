/**
 * Sample PDF builders (pdf-lib), shared by the integration tests and
 * create-test-pdfs.ts. Coordinates are pdf-lib's bottom-left origin.
 */
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { PDFFont, PDFPage } from 'pdf-lib';

export const PAGE_WIDTH = 612;
export const PAGE_HEIGHT = 792;
export const LEFT_MARGIN = 72;

const BODY_SIZE = 11;
const BODY_LEADING = 16;

const BODY_LINES = [
  'The committee met four times during the year to review progress on the plan.',
  'Regional offices reported steady demand across every product line we track.',
  'Operating costs stayed within the approved budget for the third straight year.',
  'New hiring focused on field support, logistics and customer onboarding roles.',
  'Most infrastructure upgrades were completed ahead of the planned schedule.',
  'Feedback from partners was collected through quarterly review meetings.',
  'The board approved a revised travel policy that takes effect next spring.',
  'Remaining risks are tracked in the register and reviewed every month.',
];

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

async function createDocument(): Promise<{ doc: PDFDocument; fonts: Fonts }> {
  const doc = await PDFDocument.create();
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  return { doc, fonts: { regular, bold } };
}

function addPage(doc: PDFDocument): PDFPage {
  return doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
}

/** Draw `count` body lines starting at baseline `startY`; returns the next free baseline. */
function drawBody(page: PDFPage, fonts: Fonts, startY: number, count: number): number {
  let y = startY;
  for (let i = 0; i < count; i++) {
    page.drawText(BODY_LINES[i % BODY_LINES.length], {
      x: LEFT_MARGIN,
      y,
      size: BODY_SIZE,
      font: fonts.regular,
    });
    y -= BODY_LEADING;
  }
  return y;
}

/**
 * Two pages: 24pt title and an 18pt bold section heading on page 1, a 14pt
 * bold subsection heading on page 2, 11pt body text elsewhere.
 *
 * Expected: title "Annual Report 2024"; outline
 * H1 "Section 1: Overview" (p1), H2 "1.1 Background" (p2).
 */
export async function buildAnnualReportPdf(): Promise<Uint8Array> {
  const { doc, fonts } = await createDocument();

  const first = addPage(doc);
  first.drawText('Annual Report 2024', { x: LEFT_MARGIN, y: 700, size: 24, font: fonts.bold });
  first.drawText('Section 1: Overview', { x: LEFT_MARGIN, y: 640, size: 18, font: fonts.bold });
  drawBody(first, fonts, 610, 16);

  const second = addPage(doc);
  second.drawText('1.1 Background', { x: LEFT_MARGIN, y: 700, size: 14, font: fonts.bold });
  drawBody(second, fonts, 670, 16);

  return doc.save();
}

/**
 * Three pages with a 9pt running header and footer in the margin bands, a
 * 20pt title on page 1 and one 16pt heading on page 2.
 *
 * Expected: title "Field Operations Review"; outline H1 "Regional Summary" (p2).
 */
export async function buildRunningHeaderPdf(): Promise<Uint8Array> {
  const { doc, fonts } = await createDocument();
  const pageCount = 3;

  for (let n = 1; n <= pageCount; n++) {
    const page = addPage(doc);
    page.drawText('Field Operations - Internal', { x: LEFT_MARGIN, y: 760, size: 9, font: fonts.regular });
    page.drawText(`Page ${n} of ${pageCount}`, { x: LEFT_MARGIN, y: 30, size: 9, font: fonts.regular });

    if (n === 1) {
      page.drawText('Field Operations Review', { x: LEFT_MARGIN, y: 690, size: 20, font: fonts.bold });
      drawBody(page, fonts, 650, 12);
    } else if (n === 2) {
      page.drawText('Regional Summary', { x: LEFT_MARGIN, y: 690, size: 16, font: fonts.bold });
      drawBody(page, fonts, 660, 12);
    } else {
      drawBody(page, fonts, 700, 12);
    }
  }

  return doc.save();
}

/**
 * Two pages of 11pt text only. Expected: a flat-document warning, an empty
 * outline and the first page-1 line as the title.
 */
export async function buildFlatPdf(): Promise<Uint8Array> {
  const { doc, fonts } = await createDocument();
  drawBody(addPage(doc), fonts, 700, 10);
  drawBody(addPage(doc), fonts, 700, 10);
  return doc.save();
}

/** A page with no text operators at all. */
export async function buildBlankPdf(): Promise<Uint8Array> {
  const { doc } = await createDocument();
  addPage(doc);
  return doc.save();
}

export const SAMPLE_PDFS: Record<string, () => Promise<Uint8Array>> = {
  'annual-report': buildAnnualReportPdf,
  'running-header': buildRunningHeaderPdf,
  'flat-document': buildFlatPdf,
  'blank-page': buildBlankPdf,
};

export const BODY_LINE_TEXT: readonly string[] = BODY_LINES;
