/**
 * packages/core/src/node.ts — Geometry capability shared by views and layouts.
 *
 * Coordinates and sizes are non-negative integer units. A layout assigns
 * positions to its children during arrangement; everything else goes through
 * the validated setters below.
 */

import { requireNonEmptyString, requireNonNegativeInt } from "./validate.js";

/** Top-left corner of a node. */
export type Point = Readonly<{ x: number; y: number }>;

/** Width and height of a node. */
export type Size = Readonly<{ width: number; height: number }>;

/** Initial geometry; omitted fields default to 0. */
export type Geometry = Readonly<{
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}>;

export abstract class NodeBase {
  readonly id: string;
  private _x = 0;
  private _y = 0;
  private _width = 0;
  private _height = 0;

  protected constructor(id: string, geometry: Geometry | undefined) {
    this.id = requireNonEmptyString("id", id);
    if (geometry) {
      this.setPosition(geometry.x ?? 0, geometry.y ?? 0);
      this.setSize(geometry.width ?? 0, geometry.height ?? 0);
    }
  }

  get x(): number {
    return this._x;
  }

  get y(): number {
    return this._y;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get position(): Point {
    return { x: this._x, y: this._y };
  }

  get size(): Size {
    return { width: this._width, height: this._height };
  }

  setPosition(x: number, y: number): void {
    requireNonNegativeInt("x", x);
    requireNonNegativeInt("y", y);
    this._x = x;
    this._y = y;
  }

  setSize(width: number, height: number): void {
    requireNonNegativeInt("width", width);
    requireNonNegativeInt("height", height);
    this._width = width;
    this._height = height;
  }
}
