/**
 * packages/core/src/layout/arrange.ts — Child arrangement per layout kind.
 *
 * Arrangement mutates child positions in place and is idempotent: running it
 * twice over unchanged children and padding assigns the same positions.
 */

import type { NodeBase } from "../node.js";
import { LINEAR_LAYOUT_GAP, type LayoutSpec, type Orientation, type Padding } from "./types.js";

/**
 * Place children one after another along `orientation`, starting at the
 * padding offset. The cross-axis coordinate stays at the padding offset; there
 * is no wrapping or centering.
 */
export function arrangeLinear(
  children: readonly NodeBase[],
  padding: Padding,
  orientation: Orientation,
): void {
  let cursorX = padding.left;
  let cursorY = padding.top;
  for (const child of children) {
    child.setPosition(cursorX, cursorY);
    if (orientation === "vertical") {
      cursorY += child.height + LINEAR_LAYOUT_GAP;
    } else {
      cursorX += child.width + LINEAR_LAYOUT_GAP;
    }
  }
}

export function arrangeChildren(
  spec: LayoutSpec,
  children: readonly NodeBase[],
  padding: Padding,
): void {
  switch (spec.kind) {
    case "LinearLayout":
      arrangeLinear(children, padding, spec.orientation);
      return;
    case "RelativeLayout":
      return;
  }
}
