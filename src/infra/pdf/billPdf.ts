import PDFDocument from 'pdfkit';
import type { BillDocument, DetailLine } from '../../application/billing/billDocument.js';

const REGULAR = 'Helvetica';
const BOLD = 'Helvetica-Bold';
const ITALIC = 'Helvetica-Oblique';

const LEFT = 50;
const CONTENT_WIDTH = 495;
const DIVIDER = '-'.repeat(50);

function labelledRow(pdf: PDFKit.PDFDocument, line: DetailLine, labelWidth: number): void {
  const y = pdf.y;
  pdf.text(line.label, LEFT, y, { width: labelWidth, lineBreak: false });
  pdf.text(line.value, LEFT + labelWidth, y, { width: CONTENT_WIDTH - labelWidth });
  pdf.x = LEFT;
}

function centered(pdf: PDFKit.PDFDocument, font: string, size: number, text: string): void {
  pdf.font(font).fontSize(size).text(text, LEFT, pdf.y, { width: CONTENT_WIDTH, align: 'center' });
}

/**
 * Lay out a bill on a single A4 page and return the PDF bytes.
 */
export function renderBillPdf(doc: BillDocument): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const pdf = new PDFDocument({ size: 'A4', margin: LEFT, info: { Title: `${doc.title} ${doc.billId}` } });
    const chunks: Buffer[] = [];

    pdf.on('data', (chunk: Buffer) => chunks.push(chunk));
    pdf.on('end', () => resolve(Buffer.concat(chunks)));
    pdf.on('error', reject);

    try {
      // Header
      centered(pdf, BOLD, 16, doc.facility.name);
      centered(pdf, REGULAR, 10, doc.facility.contact);
      pdf.moveDown(1.5);

      centered(pdf, BOLD, 18, doc.title);
      pdf.moveDown(0.5);
      centered(pdf, BOLD, 12, `BILL ID: ${doc.billId}`);
      pdf.moveDown(1);

      // Details
      pdf.font(BOLD).fontSize(12).text('BILL DETAILS', LEFT);
      pdf.moveDown(0.3);
      pdf.font(REGULAR).fontSize(11);
      for (const line of doc.details) {
        labelledRow(pdf, { label: `${line.label}:`, value: line.value }, 170);
      }
      pdf.moveDown(1.5);

      // Amount
      pdf.font(BOLD).fontSize(12).text('AMOUNT DETAILS', LEFT);
      pdf.moveDown(0.3);
      pdf.font(REGULAR).fontSize(11);
      labelledRow(pdf, doc.charges, 330);
      pdf.moveDown(0.8);
      pdf.font(BOLD).fontSize(14);
      labelledRow(pdf, doc.total, 330);
      pdf.moveDown(2);

      // Terms
      pdf.font(BOLD).fontSize(10).text('TERMS & CONDITIONS:', LEFT);
      pdf.font(REGULAR).fontSize(8);
      for (const term of doc.terms) {
        pdf.text(term, LEFT);
      }
      pdf.moveDown(1.5);

      // Footer
      centered(pdf, BOLD, 8, DIVIDER);
      centered(pdf, BOLD, 10, doc.footer.partnerName);
      centered(pdf, ITALIC, 8, doc.footer.partnerTagline);
      centered(pdf, BOLD, 8, DIVIDER);
      pdf.moveDown(0.3);
      centered(pdf, BOLD, 8, doc.footer.partnerHeading);
      for (const contact of doc.footer.partnerContacts) {
        centered(pdf, REGULAR, 7, contact);
      }
      pdf.moveDown(0.5);
      for (const line of doc.footer.closingLines) {
        centered(pdf, ITALIC, 7, line);
      }

      pdf.end();
    } catch (error) {
      reject(error);
    }
  });
}
