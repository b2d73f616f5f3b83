/**
 * packages/core/src/activity/stateMachine.ts — Activity lifecycle state machine.
 *
 * Legal transitions:
 *
 *   created   → started
 *   started   → resumed | stopped
 *   resumed   → paused
 *   paused    → resumed | stopped
 *   stopped   → started | destroyed
 *   destroyed → (terminal)
 *
 * An illegal transition throws DL_INVALID_STATE and leaves the state unchanged.
 *
 * @see docs/guide/lifecycle.md
 */

import { DroidletError } from "../errors.js";

export type ActivityState = "created" | "started" | "resumed" | "paused" | "stopped" | "destroyed";

export const ACTIVITY_TRANSITIONS: Readonly<Record<ActivityState, readonly ActivityState[]>> =
  Object.freeze({
    created: Object.freeze(["started"] as const),
    started: Object.freeze(["resumed", "stopped"] as const),
    resumed: Object.freeze(["paused"] as const),
    paused: Object.freeze(["resumed", "stopped"] as const),
    stopped: Object.freeze(["started", "destroyed"] as const),
    destroyed: Object.freeze([] as const),
  });

export function canTransition(from: ActivityState, to: ActivityState): boolean {
  return ACTIVITY_TRANSITIONS[from].includes(to);
}

export class LifecycleStateMachine {
  private _state: ActivityState = "created";
  private readonly _owner: string;

  constructor(owner: string) {
    this._owner = owner;
  }

  get state(): ActivityState {
    return this._state;
  }

  get isTerminal(): boolean {
    return ACTIVITY_TRANSITIONS[this._state].length === 0;
  }

  /**
   * Move to `to`, or throw DL_INVALID_STATE without changing state.
   *
   * @returns the state transitioned from
   */
  transition(to: ActivityState, method: string): ActivityState {
    const from = this._state;
    if (!canTransition(from, to)) {
      throw new DroidletError(
        "DL_INVALID_STATE",
        `${method}: activity "${this._owner}" cannot move from ${from} to ${to}`,
        { activity: this._owner, from, to },
      );
    }
    this._state = to;
    return from;
  }
}
