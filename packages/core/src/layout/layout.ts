/**
 * packages/core/src/layout/layout.ts — Container node.
 *
 * Why: Layouts own an ordered list of children (views or nested layouts) and
 * position them on arrangement. Rendering is an explicit two-step contract:
 * arrange() mutates child geometry, snapshot() serializes without side
 * effects, and render() runs both for this layout and every nested layout.
 *
 * Invariants:
 *   - The same child object is stored at most once.
 *   - Duplicate ids are allowed; findViewById returns the first direct match.
 *   - A layout never contains itself, directly or transitively.
 *
 * @see docs/guide/layout.md
 */

import { invalidProps } from "../errors.js";
import { type Geometry, NodeBase } from "../node.js";
import type { RenderedLayout, RenderedNode } from "../render/types.js";
import { requireNonNegativeInt } from "../validate.js";
import { View } from "../views/view.js";
import { arrangeChildren } from "./arrange.js";
import {
  type LayoutSpec,
  type LinearLayoutSpec,
  type Orientation,
  type Padding,
  type RelativeLayoutSpec,
  ZERO_PADDING,
} from "./types.js";

export type UiNode = View | Layout;

export class Layout<S extends LayoutSpec = LayoutSpec> extends NodeBase {
  private readonly _spec: S;
  private readonly _children: UiNode[] = [];
  private _padding: Padding = ZERO_PADDING;

  constructor(id: string, spec: S, geometry?: Geometry) {
    super(id, geometry);
    this._spec = { ...spec };
  }

  get kind(): S["kind"] {
    return this._spec.kind;
  }

  get spec(): Readonly<S> {
    return this._spec;
  }

  get children(): readonly UiNode[] {
    return this._children;
  }

  get padding(): Padding {
    return this._padding;
  }

  setOrientation(this: Layout<LinearLayoutSpec>, orientation: Orientation): void {
    if (orientation !== "vertical" && orientation !== "horizontal") {
      invalidProps(`orientation must be "vertical" or "horizontal", got ${String(orientation)}`);
    }
    this._spec.orientation = orientation;
  }

  /**
   * Append a child. Re-adding a child already present is a no-op.
   *
   * @returns whether the child was appended
   */
  addView(child: UiNode): boolean {
    if (this._children.includes(child)) return false;
    if (child instanceof Layout && child.contains(this)) {
      invalidProps(`addView: adding layout "${child.id}" to "${this.id}" would create a cycle`);
    }
    this._children.push(child);
    return true;
  }

  /** @returns whether the child was present */
  removeView(child: UiNode): boolean {
    const index = this._children.indexOf(child);
    if (index < 0) return false;
    this._children.splice(index, 1);
    return true;
  }

  /** First direct child with `id`, in insertion order. Nested layouts are not searched. */
  findViewById(id: string): UiNode | null {
    for (const child of this._children) {
      if (child.id === id) return child;
    }
    return null;
  }

  setPadding(left: number, top: number, right: number, bottom: number): void {
    this._padding = Object.freeze({
      left: requireNonNegativeInt("padding.left", left),
      top: requireNonNegativeInt("padding.top", top),
      right: requireNonNegativeInt("padding.right", right),
      bottom: requireNonNegativeInt("padding.bottom", bottom),
    });
  }

  /** True when `node` is this layout or sits anywhere in its subtree. */
  contains(node: UiNode): boolean {
    const stack: UiNode[] = [this];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) continue;
      if (current === node) return true;
      if (current instanceof Layout) stack.push(...current._children);
    }
    return false;
  }

  /** Position direct children according to this layout's kind. */
  arrange(): void {
    arrangeChildren(this._spec, this._children, this._padding);
  }

  /** Serialize the current tree as-is. Nested layouts are snapshotted, not arranged. */
  snapshot(): RenderedLayout {
    return this.describe(this._children.map(snapshotChild));
  }

  /** Arrange, then snapshot. Nested layouts are rendered (and so arranged) too. */
  render(): RenderedLayout {
    this.arrange();
    return this.describe(this._children.map((child) => child.render()));
  }

  private describe(children: readonly RenderedNode[]): RenderedLayout {
    const common = {
      id: this.id,
      padding: this._padding,
      position: Object.freeze(this.position),
      size: Object.freeze(this.size),
      children: Object.freeze(children),
    };
    const spec: LayoutSpec = this._spec;
    switch (spec.kind) {
      case "LinearLayout":
        return Object.freeze({ kind: "LinearLayout", orientation: spec.orientation, ...common });
      case "RelativeLayout":
        return Object.freeze({ kind: "RelativeLayout", ...common });
    }
  }
}

function snapshotChild(child: UiNode): RenderedNode {
  return child instanceof Layout ? child.snapshot() : child.render();
}

export type LinearLayout = Layout<LinearLayoutSpec>;
export type RelativeLayout = Layout<RelativeLayoutSpec>;

export function createLinearLayout(
  id: string,
  orientation: Orientation = "vertical",
  geometry?: Geometry,
): LinearLayout {
  if (orientation !== "vertical" && orientation !== "horizontal") {
    invalidProps(`orientation must be "vertical" or "horizontal", got ${String(orientation)}`);
  }
  return new Layout(id, { kind: "LinearLayout", orientation }, geometry);
}

export function createRelativeLayout(id: string, geometry?: Geometry): RelativeLayout {
  return new Layout(id, { kind: "RelativeLayout" }, geometry);
}

export function isLayout(node: UiNode): node is Layout {
  return node instanceof Layout;
}

export function isView(node: UiNode): node is View {
  return node instanceof View;
}
