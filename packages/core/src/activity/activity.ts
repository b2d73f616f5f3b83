/**
 * packages/core/src/activity/activity.ts — Lifecycle-governed screen.
 *
 * Why: An Activity owns a flat map of named top-level views/layouts and a
 * strict lifecycle. Subclasses customize behavior only through the on* hooks,
 * which run synchronously after the state has changed.
 *
 * Transition order for every lifecycle call:
 *   1. validate the edge (DL_INVALID_STATE, state unchanged)
 *   2. update state
 *   3. run the hook
 *   4. log and notify lifecycle listeners
 *
 * @see docs/guide/lifecycle.md
 */

import type { UiNode } from "../layout/layout.js";
import { type Logger, noopLogger } from "../logger.js";
import { requireNonEmptyString } from "../validate.js";
import { type ActivityState, LifecycleStateMachine } from "./stateMachine.js";

export type ActivityExtras = Readonly<Record<string, unknown>>;

/** Collaborators handed to an activity at construction. */
export type ActivityContext = Readonly<{
  logger?: Logger;
  extras?: ActivityExtras;
}>;

export type LifecycleEvent = Readonly<{
  activity: string;
  from: ActivityState;
  to: ActivityState;
}>;

export type LifecycleListener = (event: LifecycleEvent) => void;

type LifecycleMethod = "start" | "resume" | "pause" | "stop" | "destroy";

export class Activity {
  readonly name: string;
  readonly extras: ActivityExtras;
  protected readonly logger: Logger;
  private readonly _sm: LifecycleStateMachine;
  private readonly _views = new Map<string, UiNode>();
  private readonly _listeners: LifecycleListener[] = [];

  constructor(name: string, context: ActivityContext = {}) {
    this.name = requireNonEmptyString("activity name", name);
    this.extras = Object.freeze({ ...(context.extras ?? {}) });
    this.logger = (context.logger ?? noopLogger).child(`Activity.${name}`);
    this._sm = new LifecycleStateMachine(name);
  }

  get state(): ActivityState {
    return this._sm.state;
  }

  /** Top-level nodes by id, in insertion order. Nested layout children are not listed. */
  get views(): ReadonlyMap<string, UiNode> {
    return this._views;
  }

  start(): void {
    this.transition("start", "started");
  }

  resume(): void {
    this.transition("resume", "resumed");
  }

  pause(): void {
    this.transition("pause", "paused");
  }

  stop(): void {
    this.transition("stop", "stopped");
  }

  destroy(): void {
    this.transition("destroy", "destroyed");
  }

  protected onStart(): void {}

  protected onResume(): void {}

  protected onPause(): void {}

  protected onStop(): void {}

  protected onDestroy(): void {}

  /** Register `node` under `id`, replacing any node already stored there. */
  addView(id: string, node: UiNode): void {
    this._views.set(requireNonEmptyString("view id", id), node);
  }

  getView(id: string): UiNode | null {
    return this._views.get(id) ?? null;
  }

  /** @returns whether a node was registered under `id` */
  removeView(id: string): boolean {
    return this._views.delete(id);
  }

  getExtra(key: string, fallback?: unknown): unknown {
    return Object.prototype.hasOwnProperty.call(this.extras, key) ? this.extras[key] : fallback;
  }

  /**
   * Subscribe to completed lifecycle transitions.
   * Returns an unsubscribe function.
   */
  onLifecycle(listener: LifecycleListener): () => void {
    this._listeners.push(listener);
    return () => {
      const index = this._listeners.indexOf(listener);
      if (index >= 0) this._listeners.splice(index, 1);
    };
  }

  private transition(method: LifecycleMethod, to: ActivityState): void {
    const from = this._sm.transition(to, method);
    this.runHook(method);
    this.logger.info(`Activity ${this.name} ${to}`, { from, to });
    const event: LifecycleEvent = Object.freeze({ activity: this.name, from, to });
    for (const listener of this._listeners.slice()) listener(event);
  }

  private runHook(method: LifecycleMethod): void {
    switch (method) {
      case "start":
        this.onStart();
        return;
      case "resume":
        this.onResume();
        return;
      case "pause":
        this.onPause();
        return;
      case "stop":
        this.onStop();
        return;
      case "destroy":
        this.onDestroy();
        return;
    }
  }
}

export type ActivityClass = new (context: ActivityContext) => Activity;
export type ActivityFactoryFn = (context: ActivityContext) => Activity;

/** Either an Activity subclass or a plain function building one. */
export type ActivityFactory = ActivityClass | ActivityFactoryFn;

export function isActivityClass(factory: ActivityFactory): factory is ActivityClass {
  return typeof factory === "function" && factory.prototype instanceof Activity;
}

export function instantiateActivity(factory: ActivityFactory, context: ActivityContext): Activity {
  if (isActivityClass(factory)) return new factory(context);
  return factory(context);
}
