/**
 * packages/core/src/views/widgets.ts — View factories and variant defaults.
 *
 * Button defaults are composed from the TextView defaults, which keeps the
 * "a Button is a TextView with different colors" relationship explicit.
 */

import { View } from "./view.js";
import type {
  Button,
  ButtonContent,
  ClickListener,
  EditText,
  EditTextContent,
  TextView,
  TextViewContent,
  ViewOptions,
} from "./types.js";

export const TEXT_VIEW_DEFAULTS = Object.freeze({
  text: "",
  textColor: "#000000",
  textSize: 14,
  fontFamily: "Arial",
  backgroundColor: "#FFFFFF",
});

export const BUTTON_DEFAULTS = Object.freeze({
  ...TEXT_VIEW_DEFAULTS,
  text: "Button",
  textColor: "#FFFFFF",
  backgroundColor: "#2196F3",
});

export const EDIT_TEXT_DEFAULTS = Object.freeze({
  text: "",
  hint: "",
  textColor: "#000000",
  hintColor: "#808080",
  backgroundColor: "#FFFFFF",
});

export function createTextView(
  id: string,
  text: string = TEXT_VIEW_DEFAULTS.text,
  options: ViewOptions = {},
): TextView {
  const content: TextViewContent = {
    kind: "TextView",
    text,
    textColor: TEXT_VIEW_DEFAULTS.textColor,
    textSize: TEXT_VIEW_DEFAULTS.textSize,
    fontFamily: TEXT_VIEW_DEFAULTS.fontFamily,
  };
  return new View(id, content, {
    ...options,
    backgroundColor: options.backgroundColor ?? TEXT_VIEW_DEFAULTS.backgroundColor,
  });
}

export function createButton(
  id: string,
  text: string = BUTTON_DEFAULTS.text,
  options: ViewOptions = {},
): Button {
  const content: ButtonContent = {
    kind: "Button",
    text,
    textColor: BUTTON_DEFAULTS.textColor,
    textSize: BUTTON_DEFAULTS.textSize,
    fontFamily: BUTTON_DEFAULTS.fontFamily,
  };
  return new View(id, content, {
    ...options,
    backgroundColor: options.backgroundColor ?? BUTTON_DEFAULTS.backgroundColor,
  });
}

export function createEditText(
  id: string,
  hint: string = EDIT_TEXT_DEFAULTS.hint,
  options: ViewOptions = {},
): EditText {
  const content: EditTextContent = {
    kind: "EditText",
    text: EDIT_TEXT_DEFAULTS.text,
    hint,
    textColor: EDIT_TEXT_DEFAULTS.textColor,
    hintColor: EDIT_TEXT_DEFAULTS.hintColor,
  };
  return new View(id, content, {
    ...options,
    backgroundColor: options.backgroundColor ?? EDIT_TEXT_DEFAULTS.backgroundColor,
  });
}

/**
 * Shorthand namespace for building views inline.
 *
 * @example
 * ```ts
 * const layout = createLinearLayout("main");
 * layout.addView(widgets.textView("title", "Hello", { width: 300, height: 50 }));
 * layout.addView(widgets.button("ok", "OK", () => save(), { width: 200, height: 50 }));
 * ```
 */
export const widgets = Object.freeze({
  textView: (id: string, text: string, options?: ViewOptions): TextView =>
    createTextView(id, text, options),
  button: (
    id: string,
    text: string,
    onClick?: ClickListener,
    options: ViewOptions = {},
  ): Button => createButton(id, text, onClick ? { ...options, onClick } : options),
  editText: (id: string, hint = "", options?: ViewOptions): EditText =>
    createEditText(id, hint, options),
});
