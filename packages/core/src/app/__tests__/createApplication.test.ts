import { assert, createRecordingLogger, describe, test } from "@droidlet/testkit";
import { Activity, type ActivityContext } from "../../activity/activity.js";
import { Intent } from "../../activity/intent.js";
import { isDroidletError } from "../../errors.js";
import type { HostInfo, Renderer } from "../../renderer/types.js";
import { createApplication } from "../createApplication.js";

class MainActivity extends Activity {
  constructor(context: ActivityContext) {
    super("Main", context);
  }
}

class DetailActivity extends Activity {
  constructor(context: ActivityContext) {
    super("Detail", context);
  }
}

const BASE = Object.freeze({ appName: "Counter", packageName: "com.example.counter" });

type Mount = Readonly<{ activity: string; state: string; host: HostInfo }>;

function createFakeRenderer(): Renderer & { readonly mounts: Mount[] } {
  const mounts: Mount[] = [];
  return {
    name: "fake",
    mounts,
    mount(activity, host) {
      mounts.push({ activity: activity.name, state: activity.state, host });
    },
  };
}

describe("createApplication › registry", () => {
  test("startActivity instantiates the registered class and starts it", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Main", MainActivity);
    const activity = app.startActivity("Main");
    assert.ok(activity instanceof MainActivity);
    assert.equal(activity.state, "started");
    assert.equal(app.current(), activity);
  });

  test("plain factory functions are accepted", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Fn", (context) => new Activity("Fn", context));
    assert.equal(app.startActivity("Fn").name, "Fn");
  });

  test("unknown name throws DL_ACTIVITY_NOT_FOUND listing registered names", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Main", MainActivity);
    app.registerActivity("Detail", DetailActivity);
    assert.throws(
      () => app.startActivity("Settings"),
      (err: unknown) =>
        isDroidletError(err, "DL_ACTIVITY_NOT_FOUND") &&
        err.message ===
          'startActivity: activity "Settings" is not registered (registered: Main, Detail)' &&
        Array.isArray(err.details.registered) &&
        err.details.registered.join(",") === "Main,Detail",
    );
    assert.equal(app.current(), null);
  });

  test("empty registry reports none", () => {
    const app = createApplication({ ...BASE, gui: false });
    assert.throws(() => app.startActivity("Main"), {
      message: 'startActivity: activity "Main" is not registered (registered: none)',
    });
  });

  test("re-registering a name replaces the factory", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Main", MainActivity);
    app.registerActivity("Main", DetailActivity);
    assert.deepEqual(app.registeredActivities(), ["Main"]);
    assert.ok(app.startActivity("Main") instanceof DetailActivity);
  });

  test("empty activity names are rejected", () => {
    const app = createApplication({ ...BASE, gui: false });
    assert.throws(
      () => app.registerActivity("", MainActivity),
      (err: unknown) => isDroidletError(err, "DL_INVALID_PROPS"),
    );
  });
});

describe("createApplication › switching", () => {
  test("starting another activity stops and destroys the current one", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Main", MainActivity);
    app.registerActivity("Detail", DetailActivity);
    const main = app.startActivity("Main");
    const detail = app.startActivity("Detail");
    assert.equal(main.state, "destroyed");
    assert.equal(detail.state, "started");
    assert.equal(app.current(), detail);
  });

  test("a resumed current activity cannot be force-stopped and stays current", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Main", MainActivity);
    app.registerActivity("Detail", DetailActivity);
    const main = app.startActivity("Main");
    app.run();
    assert.equal(main.state, "resumed");
    assert.throws(
      () => app.startActivity("Detail"),
      (err: unknown) => isDroidletError(err, "DL_INVALID_STATE"),
    );
    assert.equal(app.current(), main);
    assert.equal(main.state, "resumed");
  });

  test("a throwing onDestroy still releases the previous activity", () => {
    class FailingDestroy extends Activity {
      constructor(context: ActivityContext) {
        super("FailingDestroy", context);
      }

      protected override onDestroy(): void {
        throw new Error("destroy failed");
      }
    }
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Failing", FailingDestroy);
    app.registerActivity("Main", MainActivity);
    const failing = app.startActivity("Failing");
    assert.throws(() => app.startActivity("Main"), /destroy failed/);
    assert.equal(failing.state, "destroyed");
    assert.equal(app.current(), null);

    const main = app.startActivity("Main");
    assert.equal(main.state, "started");
    assert.equal(app.current(), main);
  });

  test("a throwing onStop leaves a stopped activity the next switch can destroy", () => {
    let failStop = true;
    class FailingStop extends Activity {
      constructor(context: ActivityContext) {
        super("FailingStop", context);
      }

      protected override onStop(): void {
        if (failStop) throw new Error("stop failed");
      }
    }
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Failing", FailingStop);
    app.registerActivity("Main", MainActivity);
    const failing = app.startActivity("Failing");
    assert.throws(() => app.startActivity("Main"), /stop failed/);
    assert.equal(failing.state, "stopped");
    assert.equal(app.current(), failing);

    failStop = false;
    const main = app.startActivity("Main");
    assert.equal(failing.state, "destroyed");
    assert.equal(app.current(), main);
  });

  test("extras reach the new activity", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Detail", DetailActivity);
    const detail = app.startActivity("Detail", { itemId: 42 });
    assert.equal(detail.getExtra("itemId"), 42);
  });

  test("startIntent starts the target with the intent's extras", () => {
    const app = createApplication({ ...BASE, gui: false });
    app.registerActivity("Detail", DetailActivity);
    const detail = app.startIntent(new Intent("OPEN", "Detail").putExtra("itemId", 7));
    assert.ok(detail instanceof DetailActivity);
    assert.equal(detail.getExtra("itemId"), 7);
  });

  test("startIntent without a target throws DL_INVALID_PROPS", () => {
    const app = createApplication({ ...BASE, gui: false });
    assert.throws(() => app.startIntent(new Intent("SHARE")), {
      name: "DroidletError",
      message: 'startIntent: intent "SHARE" has no target activity',
    });
  });
});

describe("createApplication › run and renderers", () => {
  test("run without a current activity only warns", () => {
    const logger = createRecordingLogger();
    const app = createApplication({ ...BASE, gui: false, logger });
    app.run();
    assert.deepEqual(logger.messages("warn"), [
      "run: no current activity; call startActivity() first",
    ]);
  });

  test("run resumes and mounts the current activity in GUI mode", () => {
    const renderer = createFakeRenderer();
    const app = createApplication({ ...BASE, renderer });
    assert.equal(app.guiEnabled, true);
    app.registerActivity("Main", MainActivity);
    app.startActivity("Main");
    app.run();
    assert.deepEqual(renderer.mounts, [
      {
        activity: "Main",
        state: "resumed",
        host: { appName: "Counter", packageName: "com.example.counter" },
      },
    ]);
  });

  test("GUI requested without a renderer falls back to console mode", () => {
    const logger = createRecordingLogger();
    const app = createApplication({ ...BASE, gui: true, logger });
    assert.equal(app.guiEnabled, false);
    assert.deepEqual(logger.messages("warn"), ["No renderer available. Running in console mode."]);
  });

  test("gui: false never mounts even when a renderer is given", () => {
    const renderer = createFakeRenderer();
    const app = createApplication({ ...BASE, gui: false, renderer });
    app.registerActivity("Main", MainActivity);
    app.startActivity("Main");
    app.run();
    assert.equal(app.guiEnabled, false);
    assert.deepEqual(renderer.mounts, []);
    assert.equal(app.current()?.state, "resumed");
  });

  test("console-mode session logs in order", () => {
    const logger = createRecordingLogger();
    const app = createApplication({ ...BASE, gui: false, logger });
    app.registerActivity("Main", MainActivity);
    app.startActivity("Main");
    app.run();
    assert.deepEqual(logger.messages("info"), [
      "Registered activity: Main",
      "Activity Main started",
      "Started activity: Main",
      "Starting Counter application",
      "Activity Main resumed",
      "Running in console mode (no GUI)",
    ]);
    assert.deepEqual(
      [...new Set(logger.records.map((r) => r.scope))],
      ["Counter", "Counter.Activity.Main"],
    );
  });
});

describe("createApplication › config", () => {
  test("appName and packageName are validated", () => {
    assert.throws(
      () => createApplication({ appName: "", packageName: "com.example.app" }),
      (err: unknown) => isDroidletError(err, "DL_INVALID_PROPS"),
    );
    assert.throws(() => createApplication({ appName: "App", packageName: "counter" }), {
      message:
        'packageName must be a dotted identifier like com.example.app, got "counter"',
    });
  });

  test("the application object is frozen", () => {
    const app = createApplication({ ...BASE, gui: false });
    assert.equal(Object.isFrozen(app), true);
    assert.equal(app.appName, "Counter");
    assert.equal(app.packageName, "com.example.counter");
  });
});
