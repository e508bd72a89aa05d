import type { JsonPrimitive } from '../types/iq.types';

// =============================================================================
// Deep Merge over keyed result trees
// =============================================================================

export type TreeValue = JsonPrimitive | TreeValue[] | Set<JsonPrimitive> | TreeNode;

export interface TreeNode {
    [key: string]: TreeValue;
}

/**
 * Assign an own property. Plain assignment of a key such as "__proto__" would
 * hit the prototype setter instead of storing the value.
 */
export function setTreeChild(node: TreeNode, key: string, value: TreeValue): void {
    Object.defineProperty(node, key, {
        value,
        writable: true,
        enumerable: true,
        configurable: true,
    });
}

export function isTreeNode(value: TreeValue | undefined): value is TreeNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Set);
}

/**
 * Merge `source` into `target` in place.
 *
 * Keys missing from the target are deep-copied in. Where both sides hold a list
 * the source list is appended, two sets are unioned and two nodes are merged
 * recursively; in every other case the source value replaces the target's.
 *
 * @example
 * const target = { name: 'port1', tags: ['tx'] };
 * deepMerge(target, { tags: ['rx'] });
 * // target is now { name: 'port1', tags: ['tx', 'rx'] }
 */
export function deepMerge(target: TreeNode, source: TreeNode): TreeNode {
    for (const [key, value] of Object.entries(source)) {
        const existing = Object.prototype.hasOwnProperty.call(target, key) ? target[key] : undefined;

        if (Array.isArray(value) && Array.isArray(existing)) {
            existing.push(...value.map(cloneTree));
        } else if (value instanceof Set && existing instanceof Set) {
            for (const item of value) {
                existing.add(item);
            }
        } else if (isTreeNode(value) && isTreeNode(existing)) {
            deepMerge(existing, value);
        } else {
            setTreeChild(target, key, cloneTree(value));
        }
    }

    return target;
}

export function cloneTree(value: TreeValue): TreeValue {
    if (Array.isArray(value)) {
        return value.map(cloneTree);
    }
    if (value instanceof Set) {
        return new Set(value);
    }
    if (isTreeNode(value)) {
        const copy: TreeNode = {};
        for (const [key, child] of Object.entries(value)) {
            setTreeChild(copy, key, cloneTree(child));
        }
        return copy;
    }
    return value;
}
