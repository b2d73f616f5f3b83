/**
 * packages/core/src/validate.ts — Argument guards shared by views, layouts and config.
 *
 * All geometry in Droidlet is expressed in non-negative integer units.
 */

import { invalidProps } from "./errors.js";

export function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

export function requireNonEmptyString(name: string, v: unknown): string {
  if (typeof v !== "string" || v.trim().length === 0) {
    invalidProps(`${name} must be a non-empty string`);
  }
  return v;
}

export function requireBoolean(name: string, v: unknown): boolean {
  if (typeof v !== "boolean") invalidProps(`${name} must be a boolean`);
  return v;
}
