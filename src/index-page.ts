import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { cell, table, timestampLine } from './markdown.js';
import { ElementSummary } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Same location from src/ and dist/
export const USAGE_GUIDE_PATH = path.resolve(__dirname, '..', 'templates', 'usage-guide.md');

export const INDEX_FILE_NAME = 'README.md';

let cachedGuide: string | null = null;

/**
 * The static comment notation guide appended to the index.
 */
export function usageGuide(): string {
  if (cachedGuide === null) {
    cachedGuide = fs.readFileSync(USAGE_GUIDE_PATH, 'utf-8').replace(/\r\n/g, '\n').trimEnd();
  }
  return cachedGuide;
}

function compareIds(a: ElementSummary, b: ElementSummary): number {
  if (a.elementId < b.elementId) return -1;
  if (a.elementId > b.elementId) return 1;
  return 0;
}

/**
 * Render the cross-element index. Elements are listed by id, whatever order
 * they were generated in.
 */
export function renderIndex(summaries: ElementSummary[], generatedAt: Date): string {
  const sorted = [...summaries].sort(compareIds);
  const lines: string[] = [
    '# Policy Library Documentation Index',
    '',
    timestampLine(generatedAt),
    '',
    '## Available Elements',
    ''
  ];

  if (sorted.length === 0) {
    lines.push('No elements documented yet.');
  } else {
    for (const { elementId, metadata } of sorted) {
      const entry = `- [${elementId}](./${elementId}.md)`;
      lines.push(metadata.description ? `${entry}: ${cell(metadata.description)}` : entry);
    }
  }
  lines.push('', '## Overview', '');

  lines.push(
    ...table(
      ['Element', 'Policies', 'Config Policies', 'Operator Policies', 'Certificate Policies', 'PolicySets', 'Total'],
      sorted.map(({ elementId, statistics: { counts, total } }) => [
        `[${elementId}](./${elementId}.md)`,
        String(counts.policies),
        String(counts.configPolicies),
        String(counts.operatorPolicies),
        String(counts.certificatePolicies),
        String(counts.policySets),
        String(total)
      ])
    )
  );

  lines.push('', usageGuide(), '');
  return lines.join('\n');
}
