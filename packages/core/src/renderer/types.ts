/**
 * Renderer interface for host-renderer communication.
 * @see docs/guide/rendering.md
 */

import type { Activity } from "../activity/activity.js";

/** Application identity handed to the renderer on mount. */
export type HostInfo = Readonly<{
  appName: string;
  packageName: string;
}>;

/**
 * Pluggable renderer strategy.
 *
 * The host mounts the current activity once it has been resumed. A renderer
 * reads the activity through renderActivity(), presents it, and forwards
 * input back through dispatchClick(). Mounting is synchronous; a renderer
 * that keeps running (e.g. reading input) registers its own listeners and
 * returns.
 */
export interface Renderer {
  readonly name: string;
  mount(activity: Activity, host: HostInfo): void;
}
