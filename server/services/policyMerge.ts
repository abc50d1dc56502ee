/**
 * Policy Tree Utilities
 *
 * Generic operations over the JSON-like policy layers (base, district,
 * county, field). Layers stay untyped until after merge and validation;
 * see policyKnobs.ts for the typed view.
 *
 * Merge precedence: base < district < county < field.
 * - Mappings merge recursively
 * - Scalars and lists from the more specific layer replace (lists never append)
 * - Inputs are never mutated
 */

import { isPolicyTree, type JsonValue, type PolicyTree } from '@shared/schema';

/**
 * Deep-merge `patch` over `target`, returning a new tree.
 */
export function deepMerge(target: PolicyTree, patch?: PolicyTree | null): PolicyTree {
  const out: PolicyTree = { ...target };
  if (!patch) {
    return out;
  }

  for (const [key, value] of Object.entries(patch)) {
    const existing = out[key];
    if (isPolicyTree(value) && isPolicyTree(existing)) {
      out[key] = deepMerge(existing, value);
    } else {
      out[key] = cloneValue(value);
    }
  }
  return out;
}

function cloneValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isPolicyTree(value)) {
    return deepMerge({}, value);
  }
  return value;
}

/**
 * Return a copy of `tree` without the given top-level keys.
 */
export function omitKeys(tree: PolicyTree, keys: readonly string[]): PolicyTree {
  const out: PolicyTree = {};
  for (const [key, value] of Object.entries(tree)) {
    if (!keys.includes(key)) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Read a dotted path (e.g. "requirements.tag_wait_hours") from a tree.
 */
export function getPath(tree: PolicyTree, dottedPath: string): JsonValue | undefined {
  let current: JsonValue | undefined = tree;
  for (const segment of dottedPath.split('.')) {
    if (!isPolicyTree(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function getSubtree(tree: PolicyTree, key: string): PolicyTree | null {
  const value = tree[key];
  return isPolicyTree(value) ? value : null;
}

// ============================================
// TREE VISITOR
// ============================================

export interface TreeVisit {
  path: string[];
  key: string | null;
  value: JsonValue;
}

/**
 * Depth-first walk over every key and value in a tree.
 * Returning `true` from the visitor stops the walk; the function then
 * returns `true` as well.
 */
export function walkPolicyTree(
  value: JsonValue,
  visit: (node: TreeVisit) => boolean | void,
  path: string[] = []
): boolean {
  if (Array.isArray(value)) {
    return value.some((item, index) => {
      const itemPath = [...path, String(index)];
      if (visit({ path: itemPath, key: null, value: item }) === true) {
        return true;
      }
      return walkPolicyTree(item, visit, itemPath);
    });
  }

  if (isPolicyTree(value)) {
    for (const [key, child] of Object.entries(value)) {
      const childPath = [...path, key];
      if (visit({ path: childPath, key, value: child }) === true) {
        return true;
      }
      if (walkPolicyTree(child, visit, childPath)) {
        return true;
      }
    }
  }

  return false;
}
