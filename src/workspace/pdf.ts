/**
 * Print-ready rendering of a study guide.
 *
 * The markdown is tokenized with `marked` and the block tokens are
 * drawn with pdfkit: headings, paragraphs, lists, code and quotes.
 * Inline markup is reduced to plain text.
 */

import PDFDocument from 'pdfkit';
import { marked, type Token } from 'marked';
import { isJsonObject } from '../utils/json.js';

const MARGIN = 72;
const HEADING_SIZES: Record<number, number> = { 1: 20, 2: 16, 3: 13 };

/**
 * Strip inline markdown: emphasis, code spans, links and images.
 */
export function toPlainText(text: string): string {
  return text
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/(\*\*|__)(.+?)\1/g, '$2')
    .replace(/(\*|_)(.+?)\1/g, '$2')
    .replace(/`([^`]+)`/g, '$1')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");
}

function textField(value: unknown): string {
  return isJsonObject(value) && typeof value.text === 'string' ? value.text : '';
}

function drawToken(doc: PDFKit.PDFDocument, token: Token): void {
  switch (token.type) {
    case 'heading': {
      const depth = typeof token.depth === 'number' ? token.depth : 1;
      doc.moveDown(0.6);
      doc.font('Helvetica-Bold').fontSize(HEADING_SIZES[depth] ?? 12).fillColor('#222222');
      doc.text(toPlainText(textField(token)));
      doc.moveDown(0.3);
      break;
    }
    case 'paragraph':
    case 'text':
      doc.font('Helvetica').fontSize(11).fillColor('#000000');
      doc.text(toPlainText(textField(token)), { lineGap: 2 });
      doc.moveDown(0.5);
      break;
    case 'list': {
      const items: unknown[] = Array.isArray(token.items) ? token.items : [];
      const start = typeof token.start === 'number' ? token.start : 1;
      doc.font('Helvetica').fontSize(11).fillColor('#000000');
      items.forEach((item, index) => {
        const marker = token.ordered === true ? `${start + index}.` : '•';
        doc.text(`${marker} ${toPlainText(textField(item))}`, { indent: 12, lineGap: 2 });
      });
      doc.moveDown(0.5);
      break;
    }
    case 'code':
      doc.font('Courier').fontSize(9).fillColor('#333333');
      doc.text(textField(token), { indent: 12 });
      doc.moveDown(0.5);
      break;
    case 'blockquote':
      doc.font('Helvetica-Oblique').fontSize(11).fillColor('#555555');
      doc.text(toPlainText(textField(token)), { indent: 18 });
      doc.moveDown(0.5);
      break;
    case 'hr':
      doc
        .moveTo(MARGIN, doc.y)
        .lineTo(doc.page.width - MARGIN, doc.y)
        .stroke('#cccccc');
      doc.moveDown(0.5);
      break;
    default:
      // space, html, tables: not rendered
      break;
  }
}

/**
 * Render markdown to a PDF buffer.
 */
export function renderMarkdownPdf(markdown: string, title: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'LETTER',
        margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
        info: {
          Title: title,
          Subject: 'Study guide',
          Creator: 'workspace-agent',
          CreationDate: new Date(),
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      for (const token of marked.lexer(markdown)) {
        drawToken(doc, token);
      }

      doc.end();
    } catch (error) {
      reject(error instanceof Error ? error : new Error(String(error)));
    }
  });
}
