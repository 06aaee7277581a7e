/**
 * Study guide export.
 *
 * Two phases: the markdown write must succeed, the PDF is optional.
 * A failed PDF is logged and reported as null. Files are keyed by a
 * slug of the question, so the same question overwrites its guide.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ExportError } from '../errors/index.js';
import type { ExportSettings } from '../config/settings.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { truncateCodePoints } from '../utils/text.js';
import { renderMarkdownPdf } from './pdf.js';

export const FALLBACK_SLUG = 'guide';

export interface ExportedGuide {
  slug: string;
  markdownPath: string;
  markdownUrl: string;
  pdfPath: string | null;
  pdfUrl: string | null;
}

/** Renders markdown to PDF bytes; swapped out in tests */
export type PdfRenderer = (markdown: string, title: string) => Promise<Buffer>;

/**
 * Derive a filesystem-safe slug.
 *
 * Lowercase; every character that is not a Unicode letter or digit
 * becomes `-`; runs of `-` collapse; leading and trailing `-` are
 * dropped; the result is cut to `maxLength` code points. Empty results
 * become `guide`.
 */
export function slugify(text: string, maxLength: number): string {
  const dashed = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  const slug = truncateCodePoints(dashed, maxLength).replace(/-+$/, '');

  return slug || FALLBACK_SLUG;
}

/**
 * Join the public base path and a file name with exactly one slash.
 */
export function publicUrl(basePath: string, fileName: string): string {
  return `${basePath.replace(/\/+$/, '')}/${fileName}`;
}

export interface GuideExporterOptions {
  settings: ExportSettings;
  logger?: Logger;
  renderPdf?: PdfRenderer;
}

export class GuideExporter {
  private readonly settings: ExportSettings;
  private readonly logger: Logger;
  private readonly renderPdf: PdfRenderer;

  constructor(options: GuideExporterOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.renderPdf = options.renderPdf ?? renderMarkdownPdf;
  }

  /**
   * Persist a guide.
   *
   * @throws ExportError if the markdown file cannot be written
   */
  async export(markdown: string, question: string): Promise<ExportedGuide> {
    const slug = slugify(question, this.settings.slugMaxLength);
    const markdownPath = path.join(this.settings.outputDir, `${slug}.md`);

    try {
      fs.mkdirSync(this.settings.outputDir, { recursive: true });
      fs.writeFileSync(markdownPath, markdown, 'utf-8');
    } catch (error) {
      throw new ExportError(markdownPath, error instanceof Error ? error : undefined);
    }
    this.logger.debug?.(`Wrote study guide: ${markdownPath}`);

    const pdfPath = this.settings.pdf ? await this.writePdf(markdown, question, slug) : null;

    return {
      slug,
      markdownPath,
      markdownUrl: publicUrl(this.settings.publicBasePath, `${slug}.md`),
      pdfPath,
      pdfUrl: pdfPath ? publicUrl(this.settings.publicBasePath, `${slug}.pdf`) : null,
    };
  }

  private async writePdf(markdown: string, question: string, slug: string): Promise<string | null> {
    const pdfPath = path.join(this.settings.outputDir, `${slug}.pdf`);

    try {
      const bytes = await this.renderPdf(markdown, question);
      fs.writeFileSync(pdfPath, bytes);
      return pdfPath;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`PDF export skipped for ${slug}: ${message}`);
      return null;
    }
  }
}
