import * as test from 'node:test';
import * as assert from 'node:assert';
import { generateReport, locateComponent, ElementReport } from '../engine.js';
import { loadDocument } from '../parser.js';
import { ElementMetadata } from '../types.js';

const { describe, it } = test;

const GENERATED_AT = new Date(2024, 0, 2, 3, 4, 5);

const METADATA: ElementMetadata = {
  displayName: 'security-baseline',
  description: 'Security baseline element'
};

const VALUES = `stack:
  # @description: Baseline security controls
  securityBaseline:
    enable: true
    defaultPolicy:
      # @desc: Default categories
      categories:
        - CM Configuration Management
    policies:
      # @description: Main policy
      - name: sec-policy
        enabled: true
        configPolicies:
          - sec-config
    configPolicies:
      # @desc: Network isolation
      - name: sec-config
        enabled: true
        complianceType: musthave
        templateNames:
          # @desc: Deny all ingress
          - name: deny-ingress
      - name: lonely
        enabled: false
`;

function report(content: string, metadata: ElementMetadata = METADATA, elementId = 'security-baseline'): ElementReport {
  const { tree, descriptions } = loadDocument(content);
  const result = generateReport(elementId, tree, descriptions, metadata, { generatedAt: GENERATED_AT });
  assert.ok(result);
  return result;
}

function lines(content: string, metadata?: ElementMetadata): string[] {
  return report(content, metadata).markdown.split('\n');
}

/**
 * Assert that every expected line appears, in order.
 */
function assertInOrder(actual: string[], expected: string[]): void {
  let from = 0;
  for (const line of expected) {
    const at = actual.indexOf(line, from);
    assert.ok(at !== -1, `missing or out of order: ${line}`);
    from = at + 1;
  }
}

describe('generateReport', () => {

  it('should write the header with description and timestamp', () => {
    const output = lines(VALUES);

    assert.deepStrictEqual(output.slice(0, 6), [
      '# security-baseline - Policy Library Documentation',
      '',
      '> Security baseline element',
      '',
      '*Generated: 2024-01-02 03:04:05*',
      ''
    ]);
  });

  it('should omit the description line when there is none', () => {
    const output = lines(VALUES, { displayName: 'security-baseline', description: '' });

    assert.strictEqual(output[2], '*Generated: 2024-01-02 03:04:05*');
  });

  it('should render the component and default policy tables', () => {
    assertInOrder(lines(VALUES), [
      '## Component Configuration',
      '| Parameter | Value | Description |',
      '| --- | --- | --- |',
      '| Component | `securityBaseline` | Baseline security controls |',
      '| Enabled | `true` |  |',
      '## Default Policy Values',
      '| Categories | `CM Configuration Management` | Default categories |'
    ]);
  });

  it('should render a policy with inherited compliance metadata and sub-policies', () => {
    assertInOrder(lines(VALUES), [
      '## Policies',
      '### Policy: sec-policy',
      '> Main policy',
      '| Name | `sec-policy` |  |',
      '| Enabled | `true` |  |',
      '#### Compliance Metadata',
      '| Categories | `CM Configuration Management` (default) | Default categories |',
      '#### Sub-Policies',
      '##### Configuration Policies',
      '- [sec-config](#config-policy-sec-config)',
      '---'
    ]);
  });

  it('should render configuration policies with templates and back-references', () => {
    assertInOrder(lines(VALUES), [
      '## Configuration Policies',
      '### Config Policy: sec-config',
      '> Network isolation',
      '| Name | `sec-config` |  |',
      '| Enabled | `true` |  |',
      '| Compliance Type | `musthave` |  |',
      '| Referenced By | [sec-policy](#policy-sec-policy) |  |',
      '#### Templates',
      '| Template | Compliance Type | Description |',
      '| `deny-ingress` | inherited | Deny all ingress |',
      '### Config Policy: lonely',
      '| Enabled | `false` |  |',
      '| Referenced By | **orphan**: not referenced by any policy |  |'
    ]);
  });

  it('should list orphans under warnings and finish with the summary', () => {
    const output = lines(VALUES);

    assertInOrder(output, [
      '## Warnings',
      '### Orphaned Entities',
      '- Config Policy [lonely](#config-policy-lonely) is not referenced by any policy',
      '## Summary',
      '| Resource Type | Count | Enabled |',
      '| --- | --- | --- |',
      '| Policies | 1 | 1 |',
      '| Configuration Policies | 2 | 1 |',
      '| Operator Policies | 0 | 0 |',
      '| Certificate Policies | 0 | 0 |',
      '| PolicySets | 0 | 0 |',
      '| **Total Resources** | **3** | **2** |'
    ]);
    assert.strictEqual(output[output.length - 1], '');
    assert.strictEqual(output[output.length - 2], '| **Total Resources** | **3** | **2** |');
  });

  it('should skip sections absent from the component', () => {
    const output = lines(VALUES);

    assert.ok(!output.includes('## Operator Policies'));
    assert.ok(!output.includes('## PolicySets'));
    assert.ok(!output.includes('### Dangling References'));
  });

  it('should render dangling references', () => {
    const output = lines(`stack:
  securityBaseline:
    policies:
      - name: p
        configPolicies:
          - ghost
`);

    assertInOrder(output, [
      '##### Configuration Policies',
      '- `ghost` **dangling reference**: not defined in `configPolicies`',
      '## Warnings',
      '### Dangling References',
      '- Policy `p`: `configPolicies` names `ghost`, which is not defined in `configPolicies`'
    ]);
  });

  it('should render policyRef links in both directions', () => {
    const output = lines(`stack:
  securityBaseline:
    policies:
      - name: p
    operatorPolicies:
      - name: op
        policyRef: p
`);

    assertInOrder(output, [
      '### Policy: p',
      '- [op](#operator-policy-op) (via `policyRef`)',
      '### Operator Policy: op',
      '| Policy Ref | [p](#policy-p) |  |',
      '| Referenced By | [p](#policy-p) |  |'
    ]);
    assert.ok(!output.includes('## Warnings'));
  });

  it('should render anonymous entities with placeholders', () => {
    const output = lines(`stack:
  securityBaseline:
    policies:
      - enabled: true
`);

    assertInOrder(output, [
      '### Policy: (unnamed #1)',
      '| Name | *(not set)* |  |',
      '| Enabled | `true` |  |'
    ]);
  });

  it('should render placeholders for an absent enable flag', () => {
    assert.ok(lines('stack:\n  securityBaseline:\n    policies: []\n').includes('| Enabled | *(not set)* |  |'));
  });

  it('should fall back to the description field', () => {
    const output = lines(`stack:
  securityBaseline:
    policySets:
      - name: baseline-set
        description: Everything in the baseline
        policies: []
`);

    assertInOrder(output, ['### PolicySet: baseline-set', '> Everything in the baseline']);
  });

  it('should render operator subscriptions and versions', () => {
    const output = lines(`stack:
  securityBaseline:
    operatorPolicies:
      - name: gitops
        subscription:
          name: openshift-gitops-operator
          channel: stable
        versions:
          # @desc: Initial stable release
          - gitops-operator.v1.5.0
          - gitops-operator.v1.5.1
`);

    assertInOrder(output, [
      '#### Subscription',
      '| Name | `openshift-gitops-operator` |  |',
      '| Channel | `stable` |  |',
      '#### Approved Versions',
      '- `gitops-operator.v1.5.0`: Initial stable release',
      '- `gitops-operator.v1.5.1`'
    ]);
  });

  it('should compute the summary and anchors', () => {
    const result = report(VALUES);

    assert.strictEqual(result.summary.elementId, 'security-baseline');
    assert.strictEqual(result.summary.statistics.total, 3);
    assert.strictEqual(result.summary.statistics.counts.operatorPolicies, 0);
    assert.strictEqual(result.anchors.get('sec-config'), 'config-policy-sec-config');
    assert.strictEqual(result.anchors.get('sec-policy'), 'policy-sec-policy');
  });

  it('should render unchanged input identically', () => {
    assert.strictEqual(report(VALUES).markdown, report(VALUES).markdown);
  });

  it('should render the example policy with its descriptions', () => {
    const example = `# @description: Example policy
examplePolicy:
  enabled: true
  configPolicies:
    # @desc: First template
    - name: tmpl-a
    # @desc: Second template
    - name: tmpl-b
`;
    const output = report(example, { displayName: 'example-policy', description: '' }).markdown.split('\n');

    assertInOrder(output, [
      '| Component | `examplePolicy` | Example policy |',
      '| Enabled | `true` |  |',
      '### Config Policy: tmpl-a',
      '> First template',
      '### Config Policy: tmpl-b',
      '> Second template'
    ]);
  });

  it('should return null when there is no component configuration', () => {
    const { tree, descriptions } = loadDocument('unrelated: true\n');

    assert.strictEqual(generateReport('x', tree, descriptions, METADATA, { generatedAt: GENERATED_AT }), null);
  });
});

describe('locateComponent', () => {

  it('should prefer stack.<name> over a top-level key', () => {
    const { tree } = loadDocument('stack:\n  myElement:\n    enable: true\nmyElement:\n  enable: false\n');

    assert.deepStrictEqual(locateComponent(tree, ['my-element'])?.path, ['stack', 'myElement']);
  });

  it('should try each candidate name', () => {
    const { tree } = loadDocument('dirName:\n  enable: true\n');

    assert.deepStrictEqual(locateComponent(tree, ['Display Name', 'dir-name'])?.path, ['dirName']);
  });

  it('should fall back to a root holding known sections', () => {
    const { tree } = loadDocument('policies: []\n');
    const location = locateComponent(tree, ['root-element']);

    assert.deepStrictEqual(location?.path, []);
    assert.strictEqual(location?.name, 'rootElement');
  });
});
