/**
 * packages/core/src/render/types.ts — Render tree description.
 *
 * Why: The render tree is the only thing a renderer consumes. It is plain,
 * frozen, JSON-serializable data; renderers never reach back into View or
 * Layout objects except to forward input through dispatchClick().
 *
 * @see docs/guide/rendering.md
 */

import type { Point, Size } from "../node.js";
import type { Orientation, Padding } from "../layout/types.js";

type RenderedViewCommon = Readonly<{
  id: string;
  position: Point;
  size: Size;
  visible: boolean;
  enabled: boolean;
  backgroundColor: string;
}>;

type RenderedTextFields = Readonly<{
  text: string;
  textColor: string;
  textSize: number;
  fontFamily: string;
}>;

export type RenderedTextView = RenderedViewCommon & RenderedTextFields & Readonly<{ kind: "TextView" }>;

/** Same field set as a TextView; only the kind differs. */
export type RenderedButton = RenderedViewCommon & RenderedTextFields & Readonly<{ kind: "Button" }>;

export type RenderedEditText = RenderedViewCommon &
  Readonly<{
    kind: "EditText";
    text: string;
    hint: string;
    textColor: string;
    hintColor: string;
  }>;

export type RenderedView = RenderedTextView | RenderedButton | RenderedEditText;

type RenderedLayoutCommon = Readonly<{
  id: string;
  padding: Padding;
  position: Point;
  size: Size;
  children: readonly RenderedNode[];
}>;

export type RenderedLinearLayout = RenderedLayoutCommon &
  Readonly<{ kind: "LinearLayout"; orientation: Orientation }>;

export type RenderedRelativeLayout = RenderedLayoutCommon & Readonly<{ kind: "RelativeLayout" }>;

export type RenderedLayout = RenderedLinearLayout | RenderedRelativeLayout;

export type RenderedNode = RenderedView | RenderedLayout;

export function isRenderedLayout(node: RenderedNode): node is RenderedLayout {
  return node.kind === "LinearLayout" || node.kind === "RelativeLayout";
}
