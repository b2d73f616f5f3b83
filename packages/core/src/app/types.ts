import type { Activity, ActivityExtras, ActivityFactory } from "../activity/activity.js";
import type { Intent } from "../activity/intent.js";
import type { Logger } from "../logger.js";
import type { Renderer } from "../renderer/types.js";

export type ApplicationConfig = Readonly<{
  /** Human-readable application name. */
  appName: string;
  /** Dotted package identifier, e.g. `com.example.counter`. */
  packageName: string;
  /** Request GUI mode. Falls back to console mode when no renderer is available. Default true. */
  gui?: boolean;
  renderer?: Renderer | null;
  logger?: Logger;
}>;

export interface Application {
  readonly appName: string;
  readonly packageName: string;
  /** Resolved once at creation: GUI was requested and a renderer is available. */
  readonly guiEnabled: boolean;

  /** Store `factory` under `name`. Re-registering a name replaces the previous factory. */
  registerActivity(name: string, factory: ActivityFactory): void;
  /**
   * Start the activity registered under `name`, stopping and destroying the
   * current one first.
   *
   * @throws DroidletError DL_ACTIVITY_NOT_FOUND when `name` is not registered
   * @throws DroidletError DL_INVALID_STATE when the current activity cannot be stopped/destroyed
   */
  startActivity(name: string, extras?: ActivityExtras): Activity;
  /** Start `intent.target` with the intent's extras. */
  startIntent(intent: Intent): Activity;
  /** Resume the current activity and hand it to the renderer in GUI mode. */
  run(): void;
  current(): Activity | null;
  registeredActivities(): readonly string[];
}
