import { StructuralPath, TreeValue } from './types.js';

/**
 * A bound description and where it came from.
 */
export interface DescriptionEntry {
  path: StructuralPath;
  text: string;
  /** Line of the first comment in the run (1-based) */
  line: number;
}

/**
 * Map key for a path. JSON keeps `"0"` (a key) apart from `0` (an index).
 */
export function pathKey(path: StructuralPath): string {
  return JSON.stringify(path);
}

export function formatPath(path: StructuralPath): string {
  if (path.length === 0) return '(root)';
  return path
    .map((step, i) => (typeof step === 'number' ? `[${step}]` : i === 0 ? step : `.${step}`))
    .join('');
}

/**
 * Path-to-description map for one document. Immutable once built.
 */
export class DescriptionIndex {
  private readonly entries: ReadonlyMap<string, DescriptionEntry>;

  constructor(entries: Iterable<DescriptionEntry> = []) {
    const map = new Map<string, DescriptionEntry>();
    for (const entry of entries) {
      // Last one wins for a repeated path
      map.set(pathKey(entry.path), entry);
    }
    this.entries = map;
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: StructuralPath): string | undefined {
    return this.entries.get(pathKey(path))?.text;
  }

  has(path: StructuralPath): boolean {
    return this.entries.has(pathKey(path));
  }
}

/**
 * Follow a path through a decoded tree. Returns undefined when any step misses.
 */
export function resolvePath(tree: TreeValue, path: StructuralPath): TreeValue | undefined {
  let current: TreeValue | undefined = tree;
  for (const step of path) {
    if (current instanceof Map && typeof step === 'string') {
      current = current.get(step);
    } else if (Array.isArray(current) && typeof step === 'number') {
      current = step < current.length ? current[step] : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}
