/**
 * Generic tree traversal over the opaque SyntaxNode interface
 */

import type { Point, SyntaxNode } from './types.js';

/**
 * Return value of a visitor callback. `false` skips the node's children.
 */
export type VisitResult = void | boolean;

/**
 * Walk a tree depth-first in document order: a node, then its named children,
 * then the following siblings.
 *
 * Errors thrown by `visit` propagate and stop the walk.
 */
export function walkTree(
  root: SyntaxNode,
  visit: (node: SyntaxNode) => VisitResult
): void {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (visit(node) === false) continue;

    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

/**
 * Compare two points by row, then column
 */
export function comparePoints(a: Point, b: Point): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.column - b.column;
}

/**
 * Whether `point` lies inside `node` (start inclusive, end exclusive)
 */
export function nodeContainsPoint(node: SyntaxNode, point: Point): boolean {
  return (
    comparePoints(node.startPosition, point) <= 0 &&
    comparePoints(point, node.endPosition) < 0
  );
}

/**
 * Find the smallest named node covering `point`
 *
 * Returns null when the point is outside the root.
 */
export function descendantForPoint(root: SyntaxNode, point: Point): SyntaxNode | null {
  if (!nodeContainsPoint(root, point)) return null;

  let current = root;
  for (;;) {
    const next = current.namedChildren.find((child) => nodeContainsPoint(child, point));
    if (next === undefined) return current;
    current = next;
  }
}

/**
 * Kind of the node's parent and grandparent, if any
 */
export function ancestorTypes(node: SyntaxNode): {
  parent: string | null;
  grandparent: string | null;
} {
  const parent = node.parent;
  return {
    parent: parent?.type ?? null,
    grandparent: parent?.parent?.type ?? null,
  };
}
