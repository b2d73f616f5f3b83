/**
 * packages/core/src/render/tree.ts — Node-kind dispatch over UiNode trees.
 */

import { Layout, type UiNode } from "../layout/layout.js";
import type { RenderedNode } from "./types.js";

/** Arrange (for layouts) and serialize. */
export function renderNode(node: UiNode): RenderedNode {
  return node.render();
}

/** Serialize without arranging. Views have no arrangement step, so this equals render(). */
export function snapshotNode(node: UiNode): RenderedNode {
  return node instanceof Layout ? node.snapshot() : node.render();
}

/** Arrange a layout and every nested layout, without serializing. */
export function arrangeNode(node: UiNode): void {
  if (!(node instanceof Layout)) return;
  node.arrange();
  for (const child of node.children) arrangeNode(child);
}

/**
 * Visit `roots` and their descendants depth-first, in insertion order.
 * Returning `false` from `visit` stops the walk.
 */
export function walkNodes(roots: Iterable<UiNode>, visit: (node: UiNode) => boolean | void): void {
  const stack: UiNode[] = [...roots].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) continue;
    if (visit(node) === false) return;
    if (node instanceof Layout) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined) stack.push(child);
      }
    }
  }
}

/** First node with `id` in depth-first order, searching nested layouts. */
export function findNodeById(roots: Iterable<UiNode>, id: string): UiNode | null {
  let found: UiNode | null = null;
  walkNodes(roots, (node) => {
    if (node.id !== id) return true;
    found = node;
    return false;
  });
  return found;
}
