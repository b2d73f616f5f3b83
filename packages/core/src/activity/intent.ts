/**
 * packages/core/src/activity/intent.ts — Request to start an activity.
 *
 * An intent names an action, optionally a target activity, and carries extras
 * that become the started activity's extras.
 */

export class Intent {
  readonly action: string;
  readonly target: string | null;
  private readonly _extras = new Map<string, unknown>();

  constructor(action: string, target: string | null = null) {
    this.action = action;
    this.target = target;
  }

  putExtra(key: string, value: unknown): this {
    this._extras.set(key, value);
    return this;
  }

  getExtra(key: string, fallback?: unknown): unknown {
    return this._extras.has(key) ? this._extras.get(key) : fallback;
  }

  hasExtra(key: string): boolean {
    return this._extras.has(key);
  }

  /** Frozen copy of the extras, in insertion order. */
  get extras(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this._extras));
  }
}
