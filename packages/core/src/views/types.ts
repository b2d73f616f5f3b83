/**
 * packages/core/src/views/types.ts — View variant definitions.
 *
 * Views are a closed set of tagged variants. Each variant is identified by its
 * content record's `kind`; the View class is generic over that record so the
 * variant-specific setters only type-check on the matching kind.
 */

import type { Geometry } from "../node.js";
import type { View } from "./view.js";

/** Static text. */
export type TextViewContent = {
  kind: "TextView";
  text: string;
  textColor: string;
  textSize: number;
  fontFamily: string;
};

/** Pressable text: the TextView field set with its own defaults. */
export type ButtonContent = Omit<TextViewContent, "kind"> & { kind: "Button" };

/** Single-line text input with a placeholder hint. */
export type EditTextContent = {
  kind: "EditText";
  text: string;
  hint: string;
  textColor: string;
  hintColor: string;
};

export type TextLikeContent = TextViewContent | ButtonContent;
export type ViewContent = TextViewContent | ButtonContent | EditTextContent;
export type ViewKind = ViewContent["kind"];

export type ClickListener = (view: View) => void;

/** Construction-time options common to every view variant. */
export type ViewOptions = Geometry &
  Readonly<{
    backgroundColor?: string;
    visible?: boolean;
    enabled?: boolean;
    onClick?: ClickListener;
  }>;

export type TextView = View<TextViewContent>;
export type Button = View<ButtonContent>;
export type EditText = View<EditTextContent>;
