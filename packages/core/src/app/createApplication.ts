/**
 * packages/core/src/app/createApplication.ts — Application host.
 *
 * The host owns the activity registry and at most one live activity. It does
 * not render anything itself: in GUI mode the current activity is handed to
 * the configured Renderer, otherwise run() returns after resuming.
 *
 * @see docs/guide/lifecycle.md
 */

import {
  type Activity,
  type ActivityExtras,
  type ActivityFactory,
  instantiateActivity,
} from "../activity/activity.js";
import type { Intent } from "../activity/intent.js";
import { DroidletError, invalidProps } from "../errors.js";
import { type Logger, noopLogger } from "../logger.js";
import type { Renderer } from "../renderer/types.js";
import { requireBoolean, requireNonEmptyString } from "../validate.js";
import type { Application, ApplicationConfig } from "./types.js";

/** Resolved configuration with defaults applied. */
export type ResolvedApplicationConfig = Readonly<{
  appName: string;
  packageName: string;
  gui: boolean;
  renderer: Renderer | null;
  logger: Logger;
}>;

const PACKAGE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/;

/** Apply defaults to user-provided config, validating all values. */
export function resolveApplicationConfig(config: ApplicationConfig): ResolvedApplicationConfig {
  const appName = requireNonEmptyString("appName", config.appName);
  const packageName = requireNonEmptyString("packageName", config.packageName);
  if (!PACKAGE_NAME_RE.test(packageName)) {
    invalidProps(`packageName must be a dotted identifier like com.example.app, got "${packageName}"`);
  }
  const gui = config.gui === undefined ? true : requireBoolean("gui", config.gui);
  const renderer = config.renderer ?? null;
  if (renderer !== null && typeof renderer.mount !== "function") {
    invalidProps("renderer must implement mount(activity, host)");
  }
  return Object.freeze({
    appName,
    packageName,
    gui,
    renderer,
    logger: config.logger ?? noopLogger,
  });
}

export function createApplication(config: ApplicationConfig): Application {
  const cfg = resolveApplicationConfig(config);
  const logger = cfg.logger.child(cfg.appName);
  const activities = new Map<string, ActivityFactory>();
  let current: Activity | null = null;

  let renderer: Renderer | null = null;
  if (cfg.gui) {
    if (cfg.renderer === null) {
      logger.warn("No renderer available. Running in console mode.");
    } else {
      renderer = cfg.renderer;
      logger.info(`${renderer.name} renderer initialized`);
    }
  }

  function activityNotFound(name: string): never {
    const registered = [...activities.keys()];
    throw new DroidletError(
      "DL_ACTIVITY_NOT_FOUND",
      `startActivity: activity "${name}" is not registered (registered: ${
        registered.length > 0 ? registered.join(", ") : "none"
      })`,
      { name, registered },
    );
  }

  const app: Application = {
    appName: cfg.appName,
    packageName: cfg.packageName,
    guiEnabled: renderer !== null,

    registerActivity(name: string, factory: ActivityFactory): void {
      requireNonEmptyString("activity name", name);
      if (typeof factory !== "function") {
        invalidProps(`registerActivity: factory for "${name}" must be a function or class`);
      }
      activities.set(name, factory);
      logger.info(`Registered activity: ${name}`);
    },

    startActivity(name: string, extras?: ActivityExtras): Activity {
      const factory = activities.get(name);
      if (factory === undefined) activityNotFound(name);

      const previous = current;
      if (previous !== null) {
        try {
          // A stop hook that threw on an earlier switch leaves the activity stopped.
          if (previous.state !== "stopped") previous.stop();
          previous.destroy();
        } finally {
          if (previous.state === "destroyed") current = null;
        }
      }

      const next = instantiateActivity(factory, { logger, extras: extras ?? {} });
      current = next;
      next.start();
      logger.info(`Started activity: ${name}`);
      return next;
    },

    startIntent(intent: Intent): Activity {
      if (intent.target === null) {
        invalidProps(`startIntent: intent "${intent.action}" has no target activity`);
      }
      return app.startActivity(intent.target, intent.extras);
    },

    run(): void {
      logger.info(`Starting ${cfg.appName} application`);
      const activity = current;
      if (activity === null) {
        logger.warn("run: no current activity; call startActivity() first");
        return;
      }
      activity.resume();
      if (renderer !== null) {
        logger.info(`Starting GUI mode with ${renderer.name}`);
        renderer.mount(activity, { appName: cfg.appName, packageName: cfg.packageName });
        return;
      }
      logger.info("Running in console mode (no GUI)");
    },

    current(): Activity | null {
      return current;
    },

    registeredActivities(): readonly string[] {
      return Object.freeze([...activities.keys()]);
    },
  };

  return Object.freeze(app);
}
