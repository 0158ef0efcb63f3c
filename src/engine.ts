import { DescriptionIndex } from './descriptions.js';
import {
  NOT_SET,
  code,
  formatValue,
  link,
  slugify,
  table,
  timestampLine
} from './markdown.js';
import { toCamelCase } from './naming.js';
import {
  COLLECTION_KEYS,
  RelationGraph,
  Reference,
  SUB_POLICY_COLLECTIONS,
  computeStatistics,
  isTreeMap,
  nameOf
} from './relations.js';
import {
  CollectionKey,
  ElementMetadata,
  ElementSummary,
  EntityRecord,
  StructuralPath,
  TreeMap,
  TreeValue
} from './types.js';

/**
 * Options for generating one element report
 */
export interface ReportOptions {
  /** Time written on the timestamp line */
  generatedAt: Date;
}

/**
 * Result of generating one element report
 */
export interface ElementReport {
  markdown: string;
  summary: ElementSummary;
  /** Entity name to heading anchor, for cross-linking; first heading wins */
  anchors: Map<string, string>;
  /** Non-fatal conditions worth logging (dangling references and orphans are rendered instead) */
  warnings: string[];
}

/**
 * The configuration node an element documents, and where it sits in the tree.
 */
export interface ComponentLocation {
  node: TreeMap;
  path: StructuralPath;
  name: string;
}

/**
 * One rendered field: label, formatted value, description or blank.
 */
export interface FieldRecord {
  label: string;
  value: string;
  description: string;
}

interface FieldSpec {
  key: string;
  label: string;
  /** Render the placeholder when the field is absent */
  always?: boolean;
}

interface EntityKind {
  /** Section heading for the collection */
  title: string;
  /** Subsection heading prefix for one entity */
  singular: string;
  fields: FieldSpec[];
  details?: (ctx: ReportContext, entity: EntityRecord) => void;
}

const FIELD_TABLE_HEADERS = ['Parameter', 'Value', 'Description'];

const SECTION_KEYS = ['defaultPolicy', ...COLLECTION_KEYS];

const COMPLIANCE_KEYS: FieldSpec[] = [
  { key: 'categories', label: 'Categories' },
  { key: 'controls', label: 'Controls' },
  { key: 'standards', label: 'Standards' }
];

const SUBSCRIPTION_LABELS: Record<string, string> = {
  name: 'Name',
  channel: 'Channel',
  source: 'Source',
  sourceNamespace: 'Source Namespace',
  startingCSV: 'Starting CSV'
};

/**
 * Accumulates report lines and answers description lookups.
 */
class ReportContext {
  readonly lines: string[] = [];

  constructor(
    readonly component: ComponentLocation,
    readonly descriptions: DescriptionIndex,
    readonly graph: RelationGraph
  ) {}

  describe(path: StructuralPath): string {
    return this.descriptions.get(path) ?? '';
  }

  /** Push lines followed by a blank line */
  block(...lines: string[]): void {
    this.lines.push(...lines, '');
  }

  heading(level: number, text: string): void {
    this.block(`${'#'.repeat(level)} ${text}`);
  }

  fieldTable(records: FieldRecord[]): void {
    this.block(...table(FIELD_TABLE_HEADERS, records.map(r => [r.label, r.value, r.description])));
  }

  fieldRecords(node: TreeMap, path: StructuralPath, fields: FieldSpec[]): FieldRecord[] {
    return fields
      .filter(field => field.always || node.has(field.key))
      .map(field => ({
        label: field.label,
        value: formatValue(node.get(field.key)),
        description: this.describe([...path, field.key])
      }));
  }

  entityDescription(entity: EntityRecord): string {
    const fromComment = this.descriptions.get(entity.path);
    if (fromComment) return fromComment;
    const field = entity.node.get('description');
    return typeof field === 'string' ? field.trim() : '';
  }
}

function kindOf(collection: CollectionKey): EntityKind {
  return ENTITY_KINDS[collection];
}

export function entityLabel(entity: EntityRecord): string {
  return entity.name ?? `(unnamed #${entity.index + 1})`;
}

export function entityHeading(entity: EntityRecord): string {
  return `${kindOf(entity.collection).singular}: ${entityLabel(entity)}`;
}

export function entityAnchor(entity: EntityRecord): string {
  return slugify(entityHeading(entity));
}

function entityLink(entity: EntityRecord): string {
  return link(entityLabel(entity), entityAnchor(entity));
}

function danglingMarker(reference: Reference): string {
  return `${code(reference.name)} **dangling reference**: not defined in ${code(reference.collection)}`;
}

/**
 * Find the component node: `stack.<camelName>`, then `<camelName>`, for each
 * candidate name in turn, then the document root when it carries any
 * recognised section.
 */
export function locateComponent(tree: TreeValue, elementNames: string[]): ComponentLocation | null {
  if (!isTreeMap(tree)) return null;
  const names = elementNames.map(toCamelCase);
  const stack = tree.get('stack');

  for (const name of names) {
    const nested = isTreeMap(stack) ? stack.get(name) : undefined;
    if (isTreeMap(nested)) {
      return { node: nested, path: ['stack', name], name };
    }
    const topLevel = tree.get(name);
    if (isTreeMap(topLevel)) {
      return { node: topLevel, path: [name], name };
    }
  }

  if (SECTION_KEYS.some(key => tree.has(key))) {
    return { node: tree, path: [], name: names[0] ?? '' };
  }
  return null;
}

function renderComponentSection(ctx: ReportContext): void {
  const { node, path, name } = ctx.component;
  const enableKey = node.has('enable') ? 'enable' : 'enabled';

  ctx.heading(2, 'Component Configuration');
  ctx.fieldTable([
    { label: 'Component', value: code(name), description: ctx.describe(path) },
    ...ctx.fieldRecords(node, path, [
      { key: enableKey, label: 'Enabled', always: true },
      { key: 'disablePlacements', label: 'Disable Placements' },
      { key: 'usePolicySetsPlacements', label: 'Use PolicySet Placements' }
    ])
  ]);
}

function renderDefaultPolicySection(ctx: ReportContext, value: TreeValue, path: StructuralPath): void {
  ctx.heading(2, 'Default Policy Values');
  const description = ctx.describe(path);
  if (description) {
    ctx.block(description);
  }
  if (!isTreeMap(value)) {
    ctx.block(formatValue(value));
    return;
  }
  const labels = new Map(COMPLIANCE_KEYS.map(field => [field.key, field.label]));
  ctx.fieldTable(
    ctx.fieldRecords(
      value,
      path,
      [...value.keys()].map(key => ({ key, label: labels.get(key) ?? key }))
    )
  );
}

function renderCollectionSection(ctx: ReportContext, collection: CollectionKey): void {
  const kind = kindOf(collection);
  ctx.heading(2, kind.title);

  const entities = ctx.graph.list(collection);
  if (entities.length === 0) {
    ctx.block('_None defined._');
    return;
  }
  for (const entity of entities) {
    renderEntity(ctx, entity, kind);
  }
}

function renderEntity(ctx: ReportContext, entity: EntityRecord, kind: EntityKind): void {
  ctx.heading(3, entityHeading(entity));

  const description = ctx.entityDescription(entity);
  if (description) {
    ctx.block(`> ${description}`);
  }

  const records: FieldRecord[] = [
    {
      label: 'Name',
      value: entity.name === null ? NOT_SET : code(entity.name),
      description: ctx.describe([...entity.path, 'name'])
    },
    ...ctx.fieldRecords(entity.node, entity.path, kind.fields),
    ...relationRecords(ctx, entity)
  ];
  ctx.fieldTable(records);

  kind.details?.(ctx, entity);
  ctx.block('---');
}

/**
 * Rows describing how an entity is tied to the rest of the element.
 */
function relationRecords(ctx: ReportContext, entity: EntityRecord): FieldRecord[] {
  const records: FieldRecord[] = [];
  const { graph } = ctx;

  const policyRef = graph.referencesFrom(entity).find(reference => reference.field === 'policyRef');
  if (policyRef) {
    records.push({
      label: 'Policy Ref',
      value: policyRef.target ? entityLink(policyRef.target) : danglingMarker(policyRef),
      description: ctx.describe(policyRef.path)
    });
  }

  const referrers = graph.referrersOf(entity);
  if (entity.collection === 'policies') {
    if (referrers.length > 0) {
      records.push({ label: 'Included In', value: referrers.map(entityLink).join(', '), description: '' });
    }
  } else if (entity.collection !== 'policySets' && entity.name !== null) {
    records.push({
      label: 'Referenced By',
      value: graph.isOrphan(entity) ? '**orphan**: not referenced by any policy' : referrers.map(entityLink).join(', '),
      description: ''
    });
  }
  return records;
}

function renderPolicyDetails(ctx: ReportContext, policy: EntityRecord): void {
  const defaults = ctx.component.node.get('defaultPolicy');
  const defaultPath = [...ctx.component.path, 'defaultPolicy'];

  const compliance: FieldRecord[] = [];
  for (const field of COMPLIANCE_KEYS) {
    const own = policy.node.get(field.key);
    const inherited = isTreeMap(defaults) ? defaults.get(field.key) : undefined;
    if (own !== undefined && own !== null) {
      compliance.push({
        label: field.label,
        value: formatValue(own),
        description: ctx.describe([...policy.path, field.key])
      });
    } else if (inherited !== undefined && inherited !== null) {
      compliance.push({
        label: field.label,
        value: `${formatValue(inherited)} (default)`,
        description: ctx.describe([...defaultPath, field.key])
      });
    }
  }
  if (compliance.length > 0) {
    ctx.heading(4, 'Compliance Metadata');
    ctx.fieldTable(compliance);
  }

  const links = ctx.graph.subPoliciesOf(policy);
  if (links.length === 0) return;

  ctx.heading(4, 'Sub-Policies');
  for (const collection of SUB_POLICY_COLLECTIONS) {
    const group = links.filter(l => l.collection === collection);
    if (group.length === 0) continue;
    ctx.heading(5, kindOf(collection).title);
    ctx.block(
      ...group.map(l => {
        if (!l.target) return `- ${danglingMarker(l.reference)}`;
        const via = l.reference.field === 'policyRef' ? ' (via `policyRef`)' : '';
        return `- ${entityLink(l.target)}${via}`;
      })
    );
  }
}

function renderConfigPolicyDetails(ctx: ReportContext, config: EntityRecord): void {
  const templates = config.node.get('templateNames');
  if (Array.isArray(templates) && templates.length > 0) {
    const templatesPath = [...config.path, 'templateNames'];
    const rows = templates.map((template, i) => {
      const itemPath = [...templatesPath, i];
      const name = isTreeMap(template) ? nameOf(template.get('name')) : nameOf(template);
      const compliance = isTreeMap(template) ? template.get('complianceType') : undefined;
      const description = ctx.describe(itemPath) || ctx.describe([...itemPath, 'name']);
      return [
        name === null ? NOT_SET : code(name),
        compliance === undefined ? 'inherited' : formatValue(compliance),
        description
      ];
    });
    ctx.heading(4, 'Templates');
    const description = ctx.describe(templatesPath);
    if (description) ctx.block(`*${description}*`);
    ctx.block(...table(['Template', 'Compliance Type', 'Description'], rows));
  }

  const parameters = config.node.get('templateParameters');
  if (isTreeMap(parameters) && parameters.size > 0) {
    const parametersPath = [...config.path, 'templateParameters'];
    ctx.heading(4, 'Template Parameters');
    const description = ctx.describe(parametersPath);
    if (description) ctx.block(`*${description}*`);
    ctx.fieldTable(
      ctx.fieldRecords(parameters, parametersPath, [...parameters.keys()].map(key => ({ key, label: code(key) })))
    );
  }
}

function renderOperatorPolicyDetails(ctx: ReportContext, operator: EntityRecord): void {
  const subscription = operator.node.get('subscription');
  if (isTreeMap(subscription) && subscription.size > 0) {
    const subscriptionPath = [...operator.path, 'subscription'];
    ctx.heading(4, 'Subscription');
    ctx.fieldTable(
      ctx.fieldRecords(
        subscription,
        subscriptionPath,
        [...subscription.keys()].map(key => ({ key, label: SUBSCRIPTION_LABELS[key] ?? key }))
      )
    );
  }

  const versions = operator.node.get('versions');
  if (Array.isArray(versions) && versions.length > 0) {
    const versionsPath = [...operator.path, 'versions'];
    ctx.heading(4, 'Approved Versions');
    const description = ctx.describe(versionsPath);
    if (description) ctx.block(`*${description}*`);
    ctx.block(
      ...versions.map((version, i) => {
        const note = ctx.describe([...versionsPath, i]);
        return note ? `- ${formatValue(version)}: ${note}` : `- ${formatValue(version)}`;
      })
    );
  }
}

function renderPolicySetDetails(ctx: ReportContext, policySet: EntityRecord): void {
  const included = ctx.graph.referencesFrom(policySet).filter(reference => reference.field === 'policies');
  if (included.length === 0) return;
  ctx.heading(4, 'Included Policies');
  ctx.block(
    ...included.map(reference => {
      const note = ctx.describe(reference.path);
      const entry = reference.target ? entityLink(reference.target) : danglingMarker(reference);
      return note ? `- ${entry}: ${note}` : `- ${entry}`;
    })
  );
}

const SEVERITY_FIELDS: FieldSpec[] = [
  { key: 'complianceType', label: 'Compliance Type' },
  { key: 'remediationAction', label: 'Remediation' },
  { key: 'severity', label: 'Severity' }
];

const ENTITY_KINDS: Record<CollectionKey, EntityKind> = {
  policies: {
    title: 'Policies',
    singular: 'Policy',
    fields: [
      { key: 'enabled', label: 'Enabled', always: true },
      { key: 'disabled', label: 'Disabled' },
      { key: 'namespace', label: 'Namespace' },
      { key: 'severity', label: 'Severity' },
      { key: 'remediationAction', label: 'Remediation' }
    ],
    details: renderPolicyDetails
  },
  configPolicies: {
    title: 'Configuration Policies',
    singular: 'Config Policy',
    fields: [
      { key: 'enabled', label: 'Enabled', always: true },
      ...SEVERITY_FIELDS,
      { key: 'disableTemplating', label: 'Disable Templating' },
      { key: 'enableTemplateParameters', label: 'Template Parameters Enabled' }
    ],
    details: renderConfigPolicyDetails
  },
  operatorPolicies: {
    title: 'Operator Policies',
    singular: 'Operator Policy',
    fields: [
      { key: 'enabled', label: 'Enabled', always: true },
      { key: 'namespace', label: 'Namespace' },
      { key: 'displayName', label: 'Display Name' },
      ...SEVERITY_FIELDS,
      { key: 'upgradeApproval', label: 'Upgrade Approval' }
    ],
    details: renderOperatorPolicyDetails
  },
  certificatePolicies: {
    title: 'Certificate Policies',
    singular: 'Certificate Policy',
    fields: [
      { key: 'enabled', label: 'Enabled', always: true },
      { key: 'remediationAction', label: 'Remediation' },
      { key: 'severity', label: 'Severity' },
      { key: 'disableTemplating', label: 'Disable Templating' },
      { key: 'minimumDuration', label: 'Minimum Duration' },
      { key: 'maximumDuration', label: 'Maximum Duration' },
      { key: 'minimumCADuration', label: 'Minimum CA Duration' },
      { key: 'maximumCADuration', label: 'Maximum CA Duration' },
      { key: 'allowedSANPattern', label: 'Allowed SAN Pattern' },
      { key: 'disallowedSANPattern', label: 'Disallowed SAN Pattern' }
    ]
  },
  policySets: {
    title: 'PolicySets',
    singular: 'PolicySet',
    fields: [{ key: 'enabled', label: 'Enabled', always: true }],
    details: renderPolicySetDetails
  }
};

/**
 * Sections in report order. A section whose key is absent from the component is skipped.
 */
const SECTIONS: ReadonlyArray<{
  key: string;
  render: (ctx: ReportContext, value: TreeValue, path: StructuralPath) => void;
}> = [
  { key: 'defaultPolicy', render: renderDefaultPolicySection },
  ...COLLECTION_KEYS.map(collection => ({
    key: collection,
    render: (ctx: ReportContext) => renderCollectionSection(ctx, collection)
  }))
];

function describeReference(reference: Reference): string {
  const from = reference.from;
  return `- ${kindOf(from.collection).singular} ${code(entityLabel(from))}: \`${reference.field}\` names ${code(reference.name)}, which is not defined in ${code(reference.collection)}`;
}

function renderWarningsSection(ctx: ReportContext): void {
  const { dangling, orphans } = ctx.graph;
  if (dangling.length === 0 && orphans.length === 0) return;

  ctx.heading(2, 'Warnings');
  if (dangling.length > 0) {
    ctx.heading(3, 'Dangling References');
    ctx.block(...dangling.map(describeReference));
  }
  if (orphans.length > 0) {
    ctx.heading(3, 'Orphaned Entities');
    ctx.block(
      ...orphans.map(entity => `- ${kindOf(entity.collection).singular} ${entityLink(entity)} is not referenced by any policy`)
    );
  }
}

function renderSummarySection(ctx: ReportContext, summary: ElementSummary): void {
  const { counts, enabled, total, totalEnabled } = summary.statistics;
  ctx.heading(2, 'Summary');
  ctx.lines.push(
    ...table(
      ['Resource Type', 'Count', 'Enabled'],
      [
        ...COLLECTION_KEYS.map(collection => [
          kindOf(collection).title,
          String(counts[collection]),
          String(enabled[collection])
        ]),
        ['**Total Resources**', `**${total}**`, `**${totalEnabled}**`]
      ]
    )
  );
}

/**
 * Generate the reference document for one element.
 *
 * Sections follow a fixed schema order, not tree order; entities within a
 * section follow their source order, so unchanged input renders identically
 * apart from the timestamp line. Returns null when the document has no
 * component configuration to document.
 */
export function generateReport(
  elementId: string,
  tree: TreeValue,
  descriptions: DescriptionIndex,
  metadata: ElementMetadata,
  options: ReportOptions
): ElementReport | null {
  const component = locateComponent(tree, [metadata.displayName, elementId]);
  if (!component) return null;

  const graph = new RelationGraph(component.node, component.path);
  const ctx = new ReportContext(component, descriptions, graph);

  ctx.heading(1, `${metadata.displayName} - Policy Library Documentation`);
  if (metadata.description) {
    ctx.block(`> ${metadata.description}`);
  }
  ctx.block(timestampLine(options.generatedAt));

  renderComponentSection(ctx);
  for (const section of SECTIONS) {
    const value = component.node.get(section.key);
    if (value === undefined) continue;
    section.render(ctx, value, [...component.path, section.key]);
  }
  renderWarningsSection(ctx);

  const summary: ElementSummary = { elementId, metadata, statistics: computeStatistics(graph) };
  renderSummarySection(ctx, summary);

  const anchors = new Map<string, string>();
  for (const collection of COLLECTION_KEYS) {
    for (const entity of graph.list(collection)) {
      if (entity.name !== null && !anchors.has(entity.name)) {
        anchors.set(entity.name, entityAnchor(entity));
      }
    }
  }

  return {
    markdown: ctx.lines.join('\n') + '\n',
    summary,
    anchors,
    warnings: [...graph.warnings]
  };
}
