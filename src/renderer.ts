import { marked } from 'marked';
import { slugify } from './markdown.js';

/**
 * Options for rendering a report preview
 */
export interface RenderOptions {
  /** Page title */
  title: string;
  /** Entity name to heading anchor, for cross-linking */
  anchors?: Map<string, string>;
  /** Disable cross-linking (for testing) */
  disableCrossLinking?: boolean;
}

/**
 * Result of rendering markdown
 */
export interface RenderResult {
  /** The rendered page */
  html: string;
  /** Table of contents extracted from headings */
  toc: TocEntry[];
}

/**
 * A table of contents entry
 */
export interface TocEntry {
  /** Heading level (1-6) */
  level: number;
  /** Heading text */
  text: string;
  /** Slug for anchor linking, unique within the page */
  slug: string;
}

/**
 * Deepest heading level listed in the page's table of contents
 */
const TOC_DEPTH = 3;

/**
 * Escape special regex characters in a string
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

interface EntityPattern {
  anchor: string;
  regex: RegExp;
}

// Code spans and links are left as written
const PROTECTED_SEGMENT_PATTERN = /(`[^`]*`|\[[^\]]*\]\([^)]*\))/g;

function replaceOutsideProtected(
  line: string,
  pattern: RegExp,
  replacer: (match: string) => string
): string {
  const segments = line.split(PROTECTED_SEGMENT_PATTERN);
  return segments.map((segment, i) => {
    // split() puts captured separators at odd positions
    if (i % 2 === 1) {
      return segment;
    }
    return segment.replace(pattern, replacer);
  }).join('');
}

function buildEntityPatterns(anchors: Map<string, string>): EntityPattern[] {
  return Array.from(anchors.keys())
    .sort((a, b) => b.length - a.length)
    .map(name => ({
      anchor: anchors.get(name) ?? slugify(name),
      regex: new RegExp(`(?<![\\w-])${escapeRegex(name)}(?![\\w-])`, 'g')
    }));
}

function linkLine(line: string, patterns: EntityPattern[]): string {
  let result = line;
  for (const { anchor, regex } of patterns) {
    regex.lastIndex = 0;
    result = replaceOutsideProtected(result, regex, match => `[${match}](#${anchor})`);
  }
  return result;
}

/**
 * Link entity names in prose and table cells. Headings and fenced code are skipped.
 */
export function linkMarkdownContent(markdown: string, anchors: Map<string, string>): string {
  const patterns = buildEntityPatterns(anchors);
  if (patterns.length === 0) {
    return markdown;
  }
  const lines = markdown.split('\n');
  let inFence = false;
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith('```')) {
      inFence = !inFence;
      continue;
    }
    if (inFence || !trimmed || trimmed.startsWith('#')) {
      continue;
    }
    lines[i] = linkLine(lines[i], patterns);
  }
  return lines.join('\n');
}

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): typeof marked {
  marked.setOptions({
    gfm: true,        // GitHub Flavored Markdown, for tables
    breaks: false
  });

  return marked;
}

/**
 * Extract table of contents from markdown content. Repeated slugs get a
 * numeric suffix the way GitHub numbers them.
 */
export function extractToc(markdown: string): TocEntry[] {
  const toc: TocEntry[] = [];
  const seen = new Map<string, number>();
  let inFence = false;

  for (const line of markdown.split('\n')) {
    if (line.trim().startsWith('```')) {
      inFence = !inFence;
      continue;
    }
    const match = inFence ? null : line.match(/^(#{1,6})\s+(.+)$/);
    if (!match) continue;

    const text = match[2].trim();
    const base = slugify(text);
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    toc.push({
      level: match[1].length,
      text,
      slug: count === 0 ? base : `${base}-${count}`
    });
  }

  return toc;
}

/**
 * Give the rendered headings the ids of their table of contents entries, in order.
 */
function addHeadingIds(html: string, toc: TocEntry[]): string {
  let next = 0;
  return html.replace(/<h([1-6])>/g, (tag, level: string) => {
    const entry = toc[next];
    if (!entry || String(entry.level) !== level) {
      return tag;
    }
    next++;
    return `<h${level} id="${entry.slug}">`;
  });
}

function renderToc(toc: TocEntry[]): string {
  const items = toc
    .filter(entry => entry.level > 1 && entry.level <= TOC_DEPTH)
    .map(entry => `<li class="toc-level-${entry.level}"><a href="#${entry.slug}">${escapeHtml(entry.text)}</a></li>`);
  return `<nav class="toc">\n<ul>\n${items.join('\n')}\n</ul>\n</nav>`;
}

/**
 * Render a markdown report as a standalone HTML page with a table of
 * contents and entity names linked to their sections.
 */
export function renderReportHtml(markdown: string, options: RenderOptions): RenderResult {
  const markedInstance = createMarkedInstance();

  // Extract TOC before any transformations
  const toc = extractToc(markdown);

  let preprocessed = markdown;
  if (options.anchors && !options.disableCrossLinking) {
    preprocessed = linkMarkdownContent(preprocessed, options.anchors);
  }

  const body = addHeadingIds(markedInstance.parse(preprocessed) as string, toc);

  const html = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(options.title)}</title>`,
    '</head>',
    '<body>',
    renderToc(toc),
    '<main>',
    body.trimEnd(),
    '</main>',
    '</body>',
    '</html>',
    ''
  ].join('\n');

  return { html, toc };
}
