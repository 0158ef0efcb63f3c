import fs from 'fs-extra';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { loadDocument, LoadedDocument } from './parser.js';
import { ElementMetadata } from './types.js';

export const VALUES_FILE_NAME = 'values.yaml';
export const MANIFEST_FILE_NAME = 'Chart.yaml';

/**
 * Where one element's documents live
 */
export interface ElementSource {
  /** Directory name; also the report's file name */
  elementId: string;
  dir: string;
  valuesPath: string;
  manifestPath: string;
}

/**
 * Result of scanning the stack directory
 */
export interface DiscoveryResult {
  elements: ElementSource[];
  /** Directories that were passed over, and why */
  warnings: string[];
}

/**
 * One element read from disk and run through the comment-aware loader
 */
export interface LoadedElement {
  source: ElementSource;
  metadata: ElementMetadata;
  document: LoadedDocument;
  /** Manifest problems; the loader's own warnings stay on `document` */
  warnings: string[];
}

// Only the fields the report uses; anything else in the manifest is ignored
const ManifestSchema = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().optional()
});

function sourceFor(stackDir: string, elementId: string): ElementSource {
  const dir = path.join(stackDir, elementId);
  return {
    elementId,
    dir,
    valuesPath: path.join(dir, VALUES_FILE_NAME),
    manifestPath: path.join(dir, MANIFEST_FILE_NAME)
  };
}

/**
 * Find element directories: non-hidden subdirectories holding a values
 * document, sorted by name so runs are repeatable.
 */
export async function discoverElements(stackDir: string, only?: string): Promise<DiscoveryResult> {
  const entries = await fs.readdir(stackDir);
  const elements: ElementSource[] = [];
  const warnings: string[] = [];

  const names = entries
    .filter(name => !name.startsWith('.'))
    .filter(name => only === undefined || name === only)
    .sort();

  for (const name of names) {
    const source = sourceFor(stackDir, name);
    if (!(await fs.stat(source.dir)).isDirectory()) continue;
    if (await fs.pathExists(source.valuesPath)) {
      elements.push(source);
    } else {
      warnings.push(`${name}: no ${VALUES_FILE_NAME}, skipped`);
    }
  }

  return { elements, warnings };
}

/**
 * Read the manifest's display name and description. A missing or unreadable
 * manifest falls back to the directory name and no description.
 */
export async function readMetadata(source: ElementSource): Promise<{ metadata: ElementMetadata; warnings: string[] }> {
  const fallback: ElementMetadata = { displayName: source.elementId, description: '' };

  if (!(await fs.pathExists(source.manifestPath))) {
    return { metadata: fallback, warnings: [`${source.elementId}: no ${MANIFEST_FILE_NAME}, using the directory name`] };
  }

  let raw: unknown;
  try {
    raw = parseYaml(await fs.readFile(source.manifestPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    return { metadata: fallback, warnings: [`${source.elementId}: ${MANIFEST_FILE_NAME} could not be read (${reason})`] };
  }

  const result = ManifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { metadata: fallback, warnings: [`${source.elementId}: ${MANIFEST_FILE_NAME} ignored (${issues.join(', ')})`] };
  }

  return {
    metadata: {
      displayName: result.data.name ?? source.elementId,
      description: result.data.description?.trim() ?? ''
    },
    warnings: []
  };
}

/**
 * Read and decode one element. Throws StructuralParseError for a malformed
 * values document.
 */
export async function loadElement(source: ElementSource): Promise<LoadedElement> {
  const content = await fs.readFile(source.valuesPath, 'utf-8');
  const document = loadDocument(content, `${source.elementId}/${VALUES_FILE_NAME}`);
  const { metadata, warnings } = await readMetadata(source);
  return { source, metadata, document, warnings };
}
