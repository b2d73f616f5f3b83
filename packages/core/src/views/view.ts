/**
 * packages/core/src/views/view.ts — Leaf UI node.
 *
 * Why: One class serves every view variant. The variant lives in the content
 * record (`kind` plus its styling fields), so a Button is a TextView-shaped
 * record with different defaults rather than a subclass.
 *
 * @see docs/guide/views.md
 */

import { NodeBase } from "../node.js";
import type { RenderedView } from "../render/types.js";
import { requireBoolean, requireNonNegativeInt } from "../validate.js";
import type {
  ClickListener,
  EditTextContent,
  TextLikeContent,
  ViewContent,
  ViewOptions,
} from "./types.js";

export const DEFAULT_BACKGROUND_COLOR = "#FFFFFF";

export class View<C extends ViewContent = ViewContent> extends NodeBase {
  private readonly _content: C;
  private _visible: boolean;
  private _enabled: boolean;
  private _backgroundColor: string;
  private _onClick: ClickListener | null;

  constructor(id: string, content: C, options: ViewOptions = {}) {
    super(id, options);
    this._content = { ...content };
    this._visible = options.visible === undefined ? true : requireBoolean("visible", options.visible);
    this._enabled = options.enabled === undefined ? true : requireBoolean("enabled", options.enabled);
    this._backgroundColor = options.backgroundColor ?? DEFAULT_BACKGROUND_COLOR;
    this._onClick = options.onClick ?? null;
  }

  get kind(): C["kind"] {
    return this._content.kind;
  }

  /** Live variant fields. Mutate through the setters. */
  get content(): Readonly<C> {
    return this._content;
  }

  get visible(): boolean {
    return this._visible;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  get backgroundColor(): string {
    return this._backgroundColor;
  }

  get hasClickListener(): boolean {
    return this._onClick !== null;
  }

  getText(): string {
    return this._content.text;
  }

  setText(text: string): void {
    this._content.text = text;
  }

  setTextColor(color: string): void {
    this._content.textColor = color;
  }

  setTextSize(this: View<TextLikeContent>, size: number): void {
    this._content.textSize = requireNonNegativeInt("textSize", size);
  }

  setFontFamily(this: View<TextLikeContent>, fontFamily: string): void {
    this._content.fontFamily = fontFamily;
  }

  setHint(this: View<EditTextContent>, hint: string): void {
    this._content.hint = hint;
  }

  setHintColor(this: View<EditTextContent>, color: string): void {
    this._content.hintColor = color;
  }

  setVisibility(visible: boolean): void {
    this._visible = requireBoolean("visible", visible);
  }

  setEnabled(enabled: boolean): void {
    this._enabled = requireBoolean("enabled", enabled);
  }

  setBackgroundColor(color: string): void {
    this._backgroundColor = color;
  }

  /** Pass `null` to clear the listener. */
  setOnClickListener(listener: ClickListener | null): void {
    this._onClick = listener;
  }

  /**
   * Dispatch a click. Disabled views ignore clicks; visibility is advisory and
   * does not gate dispatch.
   *
   * @returns whether a listener ran
   */
  onClick(): boolean {
    const listener = this._onClick;
    if (listener === null || !this._enabled) return false;
    listener(this);
    return true;
  }

  render(): RenderedView {
    const common = {
      id: this.id,
      position: Object.freeze(this.position),
      size: Object.freeze(this.size),
      visible: this._visible,
      enabled: this._enabled,
      backgroundColor: this._backgroundColor,
    };
    const content: ViewContent = this._content;
    switch (content.kind) {
      case "TextView":
        return Object.freeze({ kind: "TextView", ...common, ...textFields(content) });
      case "Button":
        return Object.freeze({ kind: "Button", ...common, ...textFields(content) });
      case "EditText":
        return Object.freeze({
          kind: "EditText",
          ...common,
          text: content.text,
          hint: content.hint,
          textColor: content.textColor,
          hintColor: content.hintColor,
        });
    }
  }
}

function textFields(content: TextLikeContent) {
  return {
    text: content.text,
    textColor: content.textColor,
    textSize: content.textSize,
    fontFamily: content.fontFamily,
  };
}
