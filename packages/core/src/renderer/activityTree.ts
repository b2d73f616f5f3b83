/**
 * packages/core/src/renderer/activityTree.ts — Renderer-facing queries over an activity.
 *
 * Why: Renderers consume render trees and forward input events; they never
 * walk View/Layout objects themselves. These helpers are the whole surface
 * a renderer needs.
 */

import type { Activity } from "../activity/activity.js";
import { isView } from "../layout/layout.js";
import { walkNodes } from "../render/tree.js";
import type { RenderedNode } from "../render/types.js";
import type { View } from "../views/view.js";

/** Render every top-level node of `activity`, in insertion order. */
export function renderActivity(activity: Activity): readonly RenderedNode[] {
  const out: RenderedNode[] = [];
  for (const node of activity.views.values()) out.push(node.render());
  return Object.freeze(out);
}

/**
 * Views carrying a click listener, keyed by id. When ids repeat, the first
 * view in depth-first order wins.
 */
export function collectClickTargets(activity: Activity): ReadonlyMap<string, View> {
  const targets = new Map<string, View>();
  walkNodes(activity.views.values(), (node) => {
    if (isView(node) && node.hasClickListener && !targets.has(node.id)) {
      targets.set(node.id, node);
    }
  });
  return targets;
}

/**
 * Forward a click on `id` into the activity tree.
 *
 * Targets the view collectClickTargets lists under `id`.
 *
 * @returns whether a listener ran (false for unknown ids, layouts, disabled views)
 */
export function dispatchClick(activity: Activity, id: string): boolean {
  const target = findClickTarget(activity, id);
  return target !== null && target.onClick();
}

/** Same resolution as collectClickTargets: first view with `id` that has a listener. */
function findClickTarget(activity: Activity, id: string): View | null {
  let found: View | null = null;
  walkNodes(activity.views.values(), (node) => {
    if (node.id !== id || !isView(node) || !node.hasClickListener) return true;
    found = node;
    return false;
  });
  return found;
}
