import { assert, createMemorySink, createRecordingLogger, describe, test } from "../index.js";

describe("createMemorySink", () => {
  test("collects chunks and splits complete lines", () => {
    const sink = createMemorySink();
    sink.write("a\nb");
    sink.write("\n");
    assert.equal(sink.text(), "a\nb\n");
    assert.deepEqual(sink.lines(), ["a", "b"]);
    sink.clear();
    assert.deepEqual(sink.lines(), []);
  });
});

describe("createRecordingLogger", () => {
  test("children share the record list and extend the scope", () => {
    const logger = createRecordingLogger("App");
    logger.info("root");
    logger.child("Activity.Main").warn("nested", { n: 1 });
    assert.deepEqual(logger.records, [
      { level: "info", scope: "App", message: "root", fields: undefined },
      { level: "warn", scope: "App.Activity.Main", message: "nested", fields: { n: 1 } },
    ]);
    assert.deepEqual(logger.messages("warn"), ["nested"]);
    assert.deepEqual(logger.messages(), ["root", "nested"]);
  });
});
