import * as test from 'node:test';
import * as assert from 'node:assert';
import { extractToc, linkMarkdownContent, renderReportHtml } from '../renderer.js';

const { describe, it } = test;

const ANCHORS = new Map([
  ['p1', 'policy-p1'],
  ['c1', 'config-policy-c1']
]);

const REPORT = `# Demo - Policy Library Documentation

## Policies

### Policy: p1

Uses c1 here and \`c1\` in code.

### Config Policy: c1

See [p1](#policy-p1).
`;

describe('extractToc', () => {

  it('should extract headings with slugs', () => {
    assert.deepStrictEqual(extractToc(REPORT), [
      { level: 1, text: 'Demo - Policy Library Documentation', slug: 'demo-policy-library-documentation' },
      { level: 2, text: 'Policies', slug: 'policies' },
      { level: 3, text: 'Policy: p1', slug: 'policy-p1' },
      { level: 3, text: 'Config Policy: c1', slug: 'config-policy-c1' }
    ]);
  });

  it('should number repeated slugs', () => {
    assert.deepStrictEqual(
      extractToc('#### Templates\n\n#### Templates\n').map(entry => entry.slug),
      ['templates', 'templates-1']
    );
  });

  it('should ignore headings inside fenced code', () => {
    assert.deepStrictEqual(extractToc('```yaml\n# @desc: not a heading\n```\n## Real\n').map(entry => entry.text), ['Real']);
  });
});

describe('linkMarkdownContent', () => {

  it('should link names outside code spans, links and headings', () => {
    const linked = linkMarkdownContent(REPORT, ANCHORS).split('\n');

    assert.strictEqual(linked[4], '### Policy: p1');
    assert.strictEqual(linked[6], 'Uses [c1](#config-policy-c1) here and `c1` in code.');
    assert.strictEqual(linked[10], 'See [p1](#policy-p1).');
  });

  it('should only match whole names', () => {
    assert.strictEqual(linkMarkdownContent('c10 and c1-extra and c1.', ANCHORS), 'c10 and c1-extra and [c1](#config-policy-c1).');
  });
});

describe('renderReportHtml', () => {

  it('should give headings the table of contents ids', () => {
    const { html } = renderReportHtml(REPORT, { title: 'Demo', anchors: ANCHORS });

    assert.ok(html.includes('<h3 id="policy-p1">Policy: p1</h3>'));
    assert.ok(html.includes('<h3 id="config-policy-c1">Config Policy: c1</h3>'));
  });

  it('should render cross-links and leave code alone', () => {
    const { html } = renderReportHtml(REPORT, { title: 'Demo', anchors: ANCHORS });

    assert.ok(html.includes('<p>Uses <a href="#config-policy-c1">c1</a> here and <code>c1</code> in code.</p>'));
  });

  it('should skip cross-linking when disabled', () => {
    const { html } = renderReportHtml(REPORT, { title: 'Demo', anchors: ANCHORS, disableCrossLinking: true });

    assert.ok(html.includes('<p>Uses c1 here and <code>c1</code> in code.</p>'));
  });

  it('should wrap the body in a page with a table of contents', () => {
    const { html, toc } = renderReportHtml(REPORT, { title: 'Demo <draft>' });

    assert.strictEqual(toc.length, 4);
    assert.ok(html.startsWith('<!DOCTYPE html>\n'));
    assert.ok(html.includes('<title>Demo &lt;draft&gt;</title>'));
    assert.ok(html.includes('<li class="toc-level-2"><a href="#policies">Policies</a></li>'));
    assert.ok(!html.includes('<li class="toc-level-1">'));
  });
});
