import fs from 'fs-extra';
import * as path from 'node:path';
import { generateReport } from './engine.js';
import { StructuralParseError } from './errors.js';
import { INDEX_FILE_NAME, renderIndex } from './index-page.js';
import { discoverElements, loadElement, LoadedElement, VALUES_FILE_NAME } from './loader.js';
import { normalizeTimestamp } from './markdown.js';
import { renderReportHtml } from './renderer.js';
import { ElementSummary } from './types.js';

/**
 * Where progress and problems are reported
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: message => console.error(message)
};

export interface GenerationOptions {
  stackDir: string;
  outputDir: string;
  /** Generate this element only; the index is left untouched */
  element?: string;
  /** Compare with the files on disk instead of writing */
  check?: boolean;
  /** Also write an HTML preview per report */
  html?: boolean;
  /** Clock for the timestamp line (default: the current time) */
  now?: () => Date;
  log?: Logger;
}

export interface GenerationResult {
  exitCode: 0 | 1;
  /** Element ids whose report was written, or checked, successfully */
  generated: string[];
  /** Element ids whose values document could not be read or parsed */
  failed: string[];
  /** Element ids with no component configuration */
  skipped: string[];
  /** Files that are missing or differ (check mode) */
  outdated: string[];
}

/**
 * Equal apart from the timestamp line and line endings.
 */
export function sameContent(existing: string, generated: string): boolean {
  return normalizeTimestamp(existing.replace(/\r\n/g, '\n')) === normalizeTimestamp(generated);
}

class OutputSink {
  readonly outdated: string[] = [];

  constructor(
    private readonly outputDir: string,
    private readonly check: boolean,
    private readonly log: Logger
  ) {}

  async emit(fileName: string, content: string): Promise<void> {
    const filePath = path.join(this.outputDir, fileName);

    if (!this.check) {
      await fs.outputFile(filePath, content, 'utf-8');
      this.log.info(`  Generated documentation: ${filePath}`);
      return;
    }

    if (!(await fs.pathExists(filePath))) {
      this.log.error(`  Missing: ${filePath}`);
      this.outdated.push(filePath);
      return;
    }
    const existing = await fs.readFile(filePath, 'utf-8');
    if (sameContent(existing, content)) {
      this.log.info(`  Current: ${filePath}`);
    } else {
      this.log.error(`  Outdated: ${filePath}`);
      this.outdated.push(filePath);
    }
  }
}

function failure(log: Logger, message: string): GenerationResult {
  log.error(`Error: ${message}`);
  return { exitCode: 1, generated: [], failed: [], skipped: [], outdated: [] };
}

/**
 * Generate (or check) the report of every element under the stack directory,
 * then the index. An unreadable or malformed values document fails its own
 * element only.
 */
export async function runGeneration(options: GenerationOptions): Promise<GenerationResult> {
  const log = options.log ?? consoleLogger;
  const check = options.check ?? false;
  const generatedAt = (options.now ?? (() => new Date()))();

  if (!(await fs.pathExists(options.stackDir)) || !(await fs.stat(options.stackDir)).isDirectory()) {
    return failure(log, `Stack directory '${options.stackDir}' does not exist`);
  }

  const discovery = await discoverElements(options.stackDir, options.element);
  for (const warning of discovery.warnings) {
    log.warn(warning);
  }
  if (discovery.elements.length === 0) {
    return failure(
      log,
      options.element
        ? `Element '${options.element}' not found in '${options.stackDir}'`
        : `No elements found in '${options.stackDir}'`
    );
  }

  const sink = new OutputSink(options.outputDir, check, log);
  const summaries: ElementSummary[] = [];
  const generated: string[] = [];
  const failed: string[] = [];
  const skipped: string[] = [];

  for (const source of discovery.elements) {
    const { elementId } = source;
    log.info(`Processing element: ${elementId}`);

    let element: LoadedElement;
    try {
      element = await loadElement(source);
    } catch (err) {
      if (err instanceof StructuralParseError) {
        log.error(`  Failed to parse ${err.message}`);
      } else {
        const reason = err instanceof Error ? err.message : String(err);
        log.error(`  Failed to read ${elementId}/${VALUES_FILE_NAME}: ${reason}`);
      }
      failed.push(elementId);
      continue;
    }

    for (const warning of element.warnings) {
      log.warn(`  ${warning}`);
    }
    for (const warning of element.document.warnings) {
      log.warn(`  ${elementId}/${VALUES_FILE_NAME}:${warning.line}: ${warning.message}`);
    }

    const report = generateReport(
      elementId,
      element.document.tree,
      element.document.descriptions,
      element.metadata,
      { generatedAt }
    );
    if (!report) {
      log.warn(`  No component configuration found for ${elementId}, skipped`);
      skipped.push(elementId);
      continue;
    }
    for (const warning of report.warnings) {
      log.warn(`  ${elementId}: ${warning}`);
    }

    await sink.emit(`${elementId}.md`, report.markdown);
    if (options.html && !check) {
      const { html } = renderReportHtml(report.markdown, {
        title: `${element.metadata.displayName} - Policy Library Documentation`,
        anchors: report.anchors
      });
      await sink.emit(`${elementId}.html`, html);
    }

    summaries.push(report.summary);
    generated.push(elementId);
  }

  if (options.element === undefined) {
    await sink.emit(INDEX_FILE_NAME, renderIndex(summaries, generatedAt));
  }

  const outdated = sink.outdated;
  const exitCode = failed.length > 0 || outdated.length > 0 ? 1 : 0;

  if (check) {
    log.info(
      outdated.length > 0
        ? `\nDocumentation is outdated (${outdated.length} file(s)); run policy-docgen to update it.`
        : '\nAll documentation is up to date.'
    );
  } else {
    log.info(`\nDocumentation generation complete: ${generated.length} element(s) in '${options.outputDir}'`);
  }
  if (failed.length > 0) {
    log.error(`Failed elements: ${failed.join(', ')}`);
  }

  return { exitCode, generated, failed, skipped, outdated };
}
