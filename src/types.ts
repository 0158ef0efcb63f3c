/**
 * One step into a decoded document: a mapping key or a sequence index.
 */
export type PathStep = string | number;

/**
 * Ordered key/index sequence locating a node in a decoded document.
 * Paths are computed per load and never persisted.
 */
export type StructuralPath = readonly PathStep[];

export type ScalarValue = string | number | boolean | null;

/**
 * A decoded mapping. Always a Map so key order is the document's order,
 * including integer-like keys that plain objects would reorder.
 */
export interface TreeMap extends Map<string, TreeValue> {}

export type TreeValue = ScalarValue | TreeValue[] | TreeMap;

/**
 * A description comment that could not be bound into the index.
 */
export interface LoadWarning {
  /** `unbound`: no node at the comment's indentation; `unused`: bound path missing from the tree */
  kind: 'unbound' | 'unused';

  /** Line of the first comment in the run (1-based) */
  line: number;

  message: string;
}

/**
 * Display metadata for an element, read from its manifest.
 */
export interface ElementMetadata {
  /** Manifest `name`, or the element directory name */
  displayName: string;

  /** Manifest `description`, or empty */
  description: string;
}

/**
 * Keys of the entity collections the engine recognises on a component node.
 */
export type CollectionKey =
  | 'policies'
  | 'configPolicies'
  | 'operatorPolicies'
  | 'certificatePolicies'
  | 'policySets';

/**
 * Collections whose entries a Policy can reference.
 */
export type SubPolicyCollection = 'configPolicies' | 'operatorPolicies' | 'certificatePolicies';

/**
 * One entry of a recognised collection.
 */
export interface EntityRecord {
  collection: CollectionKey;

  /** Value of the `name` field; null for anonymous entries */
  name: string | null;

  /** Position in the source sequence */
  index: number;

  /** Location of the entry in the decoded tree */
  path: StructuralPath;

  node: TreeMap;
}

/**
 * Per-element counts, computed once after traversal.
 */
export interface SummaryStatistics {
  counts: Record<CollectionKey, number>;
  enabled: Record<CollectionKey, number>;
  total: number;
  totalEnabled: number;
}

/**
 * What the index needs to know about one generated element.
 */
export interface ElementSummary {
  elementId: string;
  metadata: ElementMetadata;
  statistics: SummaryStatistics;
}
