/**
 * Result Renderer
 *
 * Turns a QueryResult envelope into terminal lines: the answer first,
 * then the retrieved chunks, the tool-call trace and any document
 * links. Colors come from chalk, which honours NO_COLOR.
 */

import chalk from 'chalk';
import type { Chunk, QueryResult, TraceStep } from '../../workspace/types.js';

export interface RenderOptions {
  /** Show full chunk text instead of a one-line preview */
  verbose: boolean;
}

/** Characters of chunk text shown per line outside verbose mode */
export const PREVIEW_LENGTH = 100;

/**
 * Single-line preview: whitespace collapsed, cut with an ellipsis.
 */
export function previewText(text: string, maxLength = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  const points = Array.from(flat);
  return points.length > maxLength ? `${points.slice(0, maxLength - 1).join('')}…` : flat;
}

/**
 * "source, p. N" label for a chunk.
 */
export function formatChunkLabel(chunk: Chunk): string {
  return chunk.page === null ? chunk.source : `${chunk.source}, p. ${chunk.page}`;
}

function renderChunks(chunks: readonly Chunk[], options: RenderOptions): string[] {
  const lines = [chalk.bold(`Sources (${chunks.length}):`)];
  for (const chunk of chunks) {
    lines.push(`  ${chalk.cyan(`[${chunk.idx}]`)} ${chalk.dim(formatChunkLabel(chunk))}`);
    if (options.verbose) {
      lines.push(...chunk.text.split('\n').map((line) => `      ${line}`));
    } else if (chunk.text !== '') {
      lines.push(`      ${previewText(chunk.text)}`);
    }
  }
  return lines;
}

function renderTrace(trace: readonly TraceStep[]): string[] {
  return [
    chalk.bold('Steps:'),
    ...trace.map(
      (step) => `  ${chalk.dim(`${step.step}.`)} ${chalk.magenta(step.tool)} ${previewText(step.summary)}`
    ),
  ];
}

/**
 * Lines for text-mode output, without a trailing blank line.
 */
export function renderQueryResult(result: QueryResult, options: RenderOptions): string[] {
  const lines: string[] = [];

  lines.push(result.answer === '' ? chalk.yellow('No answer.') : result.answer);

  const chunks = result.rag?.chunks ?? [];
  if (chunks.length > 0) {
    lines.push('', ...renderChunks(chunks, options));
  }

  if (result.agent_trace.length > 0) {
    lines.push('', ...renderTrace(result.agent_trace));
  }

  if (result.markdown_url !== null || result.pdf_url !== null) {
    lines.push('', chalk.bold('Study guide:'));
    if (result.markdown_url !== null) lines.push(`  Markdown: ${result.markdown_url}`);
    if (result.pdf_url !== null) lines.push(`  PDF:      ${result.pdf_url}`);
  }

  lines.push('', chalk.dim(`mode: ${result.mode} · top_k: ${result.top_k}`));
  return lines;
}
