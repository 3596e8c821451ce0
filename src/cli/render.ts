/**
 * Output rendering for split summaries
 */

import path from 'node:path';
import type { SplitSummary } from '@/types';

export type OutputFormat = 'text' | 'json';

/**
 * Render one line per written file, followed by a totals line.
 * Paths are shown relative to `cwd`.
 */
export function renderSummaryLines(summary: SplitSummary, cwd = process.cwd()): string[] {
  const lines = summary.files.map((file) => {
    const marker = file.namespaceInjected ? ' (namespace injected)' : '';
    return `  ✓ ${path.relative(cwd, file.path)}${marker}`;
  });

  const unique = new Set(summary.files.map((file) => file.path)).size;
  lines.unshift(`${summary.group} → ${path.relative(cwd, summary.outputDir) || '.'}`);
  lines.push(`  ${summary.documents} document(s), ${unique} file(s)`);
  return lines;
}

export function renderSummaries(summaries: SplitSummary[], format: OutputFormat): void {
  if (format === 'json') {
    console.info(JSON.stringify(summaries, null, 2));
    return;
  }

  for (const summary of summaries) {
    renderSummaryLines(summary).forEach((line) => console.info(line));
  }
}
