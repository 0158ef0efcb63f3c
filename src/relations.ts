import {
  CollectionKey,
  EntityRecord,
  StructuralPath,
  SubPolicyCollection,
  SummaryStatistics,
  TreeMap,
  TreeValue
} from './types.js';

export const SUB_POLICY_COLLECTIONS: readonly SubPolicyCollection[] = [
  'configPolicies',
  'operatorPolicies',
  'certificatePolicies'
];

export const COLLECTION_KEYS: readonly CollectionKey[] = [
  'policies',
  ...SUB_POLICY_COLLECTIONS,
  'policySets'
];

/**
 * A name written in one entity's field, looked up in a collection of the same element.
 */
export interface Reference {
  /** Entity whose field holds the name */
  from: EntityRecord;

  /** Field holding the name: a reference list key or `policyRef` */
  field: string;

  /** Location of the name in the decoded tree */
  path: StructuralPath;

  /** Collection the name is looked up in */
  collection: CollectionKey;

  name: string;

  /** Resolved entity, or null for a dangling reference */
  target: EntityRecord | null;
}

/**
 * A sub-policy as seen from the Policy that references it.
 */
export interface SubPolicyLink {
  collection: SubPolicyCollection;
  name: string;
  target: EntityRecord | null;
  reference: Reference;
}

export function isTreeMap(value: TreeValue | undefined): value is TreeMap {
  return value instanceof Map;
}

/**
 * Read an identifying name: strings as-is, numbers stringified, anything else anonymous.
 */
export function nameOf(value: TreeValue | undefined): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Relationships between the entities of one element, built in a single
 * indexing pass before any reference is resolved.
 */
export class RelationGraph {
  readonly entities = new Map<CollectionKey, EntityRecord[]>();
  readonly references: Reference[] = [];
  readonly warnings: string[] = [];

  /**
   * Named sub-policies that no Policy reference list names and whose
   * `policyRef` does not resolve, in collection order.
   */
  readonly orphans: EntityRecord[];

  private readonly byName = new Map<CollectionKey, Map<string, EntityRecord>>();
  private readonly outgoing = new Map<EntityRecord, Reference[]>();
  private readonly subPolicies = new Map<EntityRecord, SubPolicyLink[]>();
  private readonly parents = new Map<EntityRecord, EntityRecord[]>();
  private readonly referencedNames = new Map<CollectionKey, Set<string>>();

  constructor(component: TreeMap, basePath: StructuralPath) {
    for (const collection of COLLECTION_KEYS) {
      this.indexCollection(component, basePath, collection);
    }
    for (const policy of this.list('policies')) {
      for (const collection of SUB_POLICY_COLLECTIONS) {
        for (const reference of this.resolveList(policy, collection, collection)) {
          this.linkSubPolicy(policy, { collection, name: reference.name, target: reference.target, reference });
        }
      }
    }
    for (const collection of SUB_POLICY_COLLECTIONS) {
      for (const entity of this.list(collection)) {
        this.resolvePolicyRef(entity, collection);
      }
    }
    for (const policySet of this.list('policySets')) {
      for (const reference of this.resolveList(policySet, 'policies', 'policies')) {
        if (reference.target) this.linkParent(reference.target, policySet);
      }
    }
    this.orphans = this.findOrphans();
  }

  /** Entities of a collection in source order; empty when the collection is absent */
  list(collection: CollectionKey): EntityRecord[] {
    return this.entities.get(collection) ?? [];
  }

  lookup(collection: CollectionKey, name: string): EntityRecord | undefined {
    return this.byName.get(collection)?.get(name);
  }

  get dangling(): Reference[] {
    return this.references.filter(reference => reference.target === null);
  }

  private findOrphans(): EntityRecord[] {
    const result: EntityRecord[] = [];
    for (const collection of SUB_POLICY_COLLECTIONS) {
      const referenced = this.referencedNames.get(collection) ?? new Set<string>();
      for (const entity of this.list(collection)) {
        if (entity.name !== null && !referenced.has(entity.name)) {
          result.push(entity);
        }
      }
    }
    return result;
  }

  isOrphan(entity: EntityRecord): boolean {
    return this.orphans.includes(entity);
  }

  referencesFrom(entity: EntityRecord): Reference[] {
    return this.outgoing.get(entity) ?? [];
  }

  subPoliciesOf(policy: EntityRecord): SubPolicyLink[] {
    return this.subPolicies.get(policy) ?? [];
  }

  /** Policies that reference a sub-policy, or PolicySets that include a Policy */
  referrersOf(entity: EntityRecord): EntityRecord[] {
    return this.parents.get(entity) ?? [];
  }

  private indexCollection(component: TreeMap, basePath: StructuralPath, collection: CollectionKey): void {
    const value = component.get(collection);
    if (value === undefined) return;

    const records: EntityRecord[] = [];
    const names = new Map<string, EntityRecord>();
    this.entities.set(collection, records);
    this.byName.set(collection, names);

    if (!Array.isArray(value)) {
      this.warnings.push(`${collection} is not a list and was skipped`);
      return;
    }

    value.forEach((node, index) => {
      if (!isTreeMap(node)) {
        this.warnings.push(`${collection}[${index}] is not a mapping and was skipped`);
        return;
      }
      const record: EntityRecord = {
        collection,
        name: nameOf(node.get('name')),
        index,
        path: [...basePath, collection, index],
        node
      };
      records.push(record);
      if (record.name === null) return;
      if (names.has(record.name)) {
        this.warnings.push(`${collection} defines "${record.name}" more than once; references use the first definition`);
      } else {
        names.set(record.name, record);
      }
    });
  }

  private addReference(reference: Reference): void {
    this.references.push(reference);
    const outgoing = this.outgoing.get(reference.from) ?? [];
    outgoing.push(reference);
    this.outgoing.set(reference.from, outgoing);
  }

  private markReferenced(collection: CollectionKey, name: string): void {
    const names = this.referencedNames.get(collection) ?? new Set<string>();
    names.add(name);
    this.referencedNames.set(collection, names);
  }

  private linkParent(child: EntityRecord, parent: EntityRecord): void {
    const parents = this.parents.get(child) ?? [];
    if (!parents.includes(parent)) {
      parents.push(parent);
    }
    this.parents.set(child, parents);
  }

  private linkSubPolicy(policy: EntityRecord, link: SubPolicyLink): void {
    const links = this.subPolicies.get(policy) ?? [];
    const duplicate = link.target !== null && links.some(existing => existing.target === link.target);
    if (!duplicate) {
      links.push(link);
    }
    this.subPolicies.set(policy, links);
    if (link.target) {
      this.linkParent(link.target, policy);
    }
  }

  /**
   * Resolve the names in `from[field]`, strings or mappings with a `name`.
   */
  private resolveList(from: EntityRecord, field: string, collection: CollectionKey): Reference[] {
    const value = from.node.get(field);
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.warnings.push(`${from.collection} "${from.name ?? from.index}" has a ${field} field that is not a list`);
      return [];
    }

    const resolved: Reference[] = [];
    value.forEach((item, index) => {
      const name = isTreeMap(item) ? nameOf(item.get('name')) : nameOf(item);
      if (name === null) return;

      const reference: Reference = {
        from,
        field,
        path: [...from.path, field, index],
        collection,
        name,
        target: this.lookup(collection, name) ?? null
      };
      this.addReference(reference);
      this.markReferenced(collection, name);
      resolved.push(reference);
    });
    return resolved;
  }

  /**
   * A sub-policy's `policyRef` declares the reference from the other side.
   */
  private resolvePolicyRef(entity: EntityRecord, collection: SubPolicyCollection): void {
    const name = nameOf(entity.node.get('policyRef'));
    if (name === null) return;

    const policy = this.lookup('policies', name) ?? null;
    const reference: Reference = {
      from: entity,
      field: 'policyRef',
      path: [...entity.path, 'policyRef'],
      collection: 'policies',
      name,
      target: policy
    };
    this.addReference(reference);

    if (policy && entity.name !== null) {
      this.markReferenced(collection, entity.name);
      this.linkSubPolicy(policy, { collection, name: entity.name, target: entity, reference });
    }
  }
}

export function isEnabled(entity: EntityRecord): boolean {
  return entity.node.get('enabled') === true;
}

function emptyCounts(): Record<CollectionKey, number> {
  return { policies: 0, configPolicies: 0, operatorPolicies: 0, certificatePolicies: 0, policySets: 0 };
}

/**
 * Counts from the collections actually present; absent collections count zero.
 */
export function computeStatistics(graph: RelationGraph): SummaryStatistics {
  const counts = emptyCounts();
  const enabled = emptyCounts();
  let total = 0;
  let totalEnabled = 0;

  for (const collection of COLLECTION_KEYS) {
    const entities = graph.list(collection);
    counts[collection] = entities.length;
    enabled[collection] = entities.filter(isEnabled).length;
    total += counts[collection];
    totalEnabled += enabled[collection];
  }

  return { counts, enabled, total, totalEnabled };
}
