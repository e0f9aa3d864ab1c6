import { PDFDocument, StandardFonts } from "pdf-lib";

export type TextPlacement = {
  text: string;
  x: number;
  y: number;
  size: number;
  bold?: boolean;
};

export const A4_HEIGHT = 842;

export const buildPdf = async (pages: TextPlacement[][]): Promise<Uint8Array> => {
  const document = await PDFDocument.create();
  const regular = await document.embedFont(StandardFonts.Helvetica);
  const bold = await document.embedFont(StandardFonts.HelveticaBold);

  for (const placements of pages) {
    const page = document.addPage([595, A4_HEIGHT]);
    for (const { text, x, y, size, bold: isBold } of placements) {
      page.drawText(text, { x, y, size, font: isBold ? bold : regular });
    }
  }

  return document.save();
};

/** Two pages: clause 4 with 4.1 on the first, 4.2 with a hyphenated body on the second. */
export const buildStandardDocument = (): Promise<Uint8Array> =>
  buildPdf([
    [
      { text: "4 Safety requirements", x: 72, y: 760, size: 16, bold: true },
      { text: "4.1 General", x: 72, y: 730, size: 15, bold: true },
      { text: "This clause describes the general requirements.", x: 72, y: 700, size: 11 },
      { text: "Copyright British Standards Institution", x: 72, y: 40, size: 8 },
    ],
    [
      { text: "4.2 Design", x: 72, y: 780, size: 15, bold: true },
      { text: "Safety functions shall be identified and docu-", x: 72, y: 750, size: 11 },
      { text: "mented in full.", x: 72, y: 736, size: 11 },
    ],
  ]);

export const STANDARD_DOCUMENT_ROWS = [
  ["Clause", "Title", "Parent", "Level", "Text"],
  ["4", "Safety requirements", "", "1", ""],
  ["4.1", "General", "4", "2", "This clause describes the general requirements."],
  ["4.2", "Design", "4", "2", "Safety functions shall be identified and documented in full."],
];
