/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * @see docs/guide/layout.md
 */

/** Main axis of a LinearLayout. */
export type Orientation = "vertical" | "horizontal";

/** Inner spacing of a layout, in integer units. */
export type Padding = Readonly<{ left: number; top: number; right: number; bottom: number }>;

export type LinearLayoutSpec = { kind: "LinearLayout"; orientation: Orientation };

/** Children keep their manually assigned positions. */
export type RelativeLayoutSpec = { kind: "RelativeLayout" };

export type LayoutSpec = LinearLayoutSpec | RelativeLayoutSpec;
export type LayoutKind = LayoutSpec["kind"];

/** Fixed gap between consecutive LinearLayout children along the main axis. */
export const LINEAR_LAYOUT_GAP = 10;

export const ZERO_PADDING: Padding = Object.freeze({ left: 0, top: 0, right: 0, bottom: 0 });
