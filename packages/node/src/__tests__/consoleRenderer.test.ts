import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import test from "node:test";
import { setImmediate as tick } from "node:timers/promises";
import {
  Activity,
  createButton,
  createEditText,
  createLinearLayout,
  createRelativeLayout,
  createTextView,
  renderActivity,
} from "@droidlet/core";
import { createMemorySink } from "@droidlet/testkit";
import { createConsoleRenderer, formatRenderTree } from "../renderer/consoleRenderer.js";

const HOST = Object.freeze({ appName: "Counter", packageName: "com.example.counter" });

function buildCounter(): Activity {
  const activity = new Activity("Main");
  let count = 0;
  const main = createLinearLayout("main");
  main.setPadding(5, 5, 5, 5);
  const title = createTextView("title", "Count: 0", { width: 300, height: 20 });
  main.addView(title);
  main.addView(
    createButton("inc", "+", {
      width: 60,
      height: 30,
      onClick: () => {
        count += 1;
        title.setText(`Count: ${count}`);
      },
    }),
  );
  main.addView(createEditText("amount", "Amount", { width: 100, height: 30 }));
  const dec = createButton("dec", "-", { width: 60, height: 30, onClick: () => {} });
  dec.setEnabled(false);
  main.addView(dec);
  activity.addView("main", main);
  return activity;
}

const COUNTER_LINES = [
  "LinearLayout#main vertical @(0,0) 0x0 pad(5,5,5,5)",
  '  TextView#title "Count: 0" @(5,5) 300x20',
  '  Button#inc "+" @(5,35) 60x30',
  '  EditText#amount hint="Amount" @(5,75) 100x30',
  '  Button#dec "-" @(5,115) 60x30 [disabled]',
];

test("formatRenderTree outlines layouts and views", () => {
  assert.equal(formatRenderTree(renderActivity(buildCounter())), COUNTER_LINES.join("\n"));
});

test("formatRenderTree shows relative layouts, hidden views and typed text", () => {
  const overlay = createRelativeLayout("overlay", { x: 1, y: 2, width: 3, height: 4 });
  const label = createTextView("t", "", { x: 7, y: 8 });
  label.setVisibility(false);
  overlay.addView(label);
  const field = createEditText("e", "Name", { x: 0, y: 0 });
  field.setText("test-user");
  assert.equal(
    formatRenderTree([overlay.render(), field.render()]),
    [
      "RelativeLayout#overlay @(1,2) 3x4 pad(0,0,0,0)",
      '  TextView#t "" @(7,8) 0x0 [hidden]',
      'EditText#e "test-user" @(0,0) 0x0',
    ].join("\n"),
  );
  assert.equal(formatRenderTree([]), "");
});

test("mount prints a header and the activity outline", () => {
  const sink = createMemorySink();
  const renderer = createConsoleRenderer({ output: sink });
  assert.equal(renderer.name, "console");
  renderer.mount(buildCounter(), HOST);
  assert.deepEqual(sink.lines(), ["== Counter / Main ==", ...COUNTER_LINES]);
});

test("handleCommand dispatches clicks and redraws", () => {
  const sink = createMemorySink();
  const renderer = createConsoleRenderer({ output: sink });
  assert.equal(renderer.handleCommand("render"), "ignored");
  renderer.mount(buildCounter(), HOST);
  sink.clear();

  assert.equal(renderer.handleCommand("click inc"), "clicked");
  assert.equal(sink.lines()[2], '  TextView#title "Count: 1" @(5,5) 300x20');

  sink.clear();
  assert.equal(renderer.handleCommand("click dec"), "ignored");
  assert.equal(renderer.handleCommand("click nope"), "ignored");
  assert.equal(renderer.handleCommand("   "), "ignored");
  assert.equal(renderer.handleCommand("jump"), "unknown");
  assert.deepEqual(sink.lines(), [
    'no enabled clickable view "dec"',
    'no enabled clickable view "nope"',
    'unknown command "jump" (use: click <id> | type <id> <text> | render | quit)',
  ]);

  sink.clear();
  assert.equal(renderer.handleCommand("render"), "rendered");
  assert.equal(sink.lines().length, 1 + COUNTER_LINES.length);
  assert.equal(renderer.handleCommand("quit"), "closed");
});

test("type sets the text of the first matching EditText", () => {
  const sink = createMemorySink();
  const renderer = createConsoleRenderer({ output: sink });
  renderer.mount(buildCounter(), HOST);
  sink.clear();

  assert.equal(renderer.handleCommand("type amount 12 apples"), "typed");
  assert.equal(sink.lines()[4], '  EditText#amount "12 apples" @(5,75) 100x30');

  assert.equal(renderer.handleCommand("type amount"), "typed");
  assert.equal(sink.lines().at(-2), '  EditText#amount hint="Amount" @(5,75) 100x30');

  sink.clear();
  assert.equal(renderer.handleCommand("type title hello"), "ignored");
  assert.equal(renderer.handleCommand("type"), "ignored");
  assert.deepEqual(sink.lines(), ['no text field "title"', 'no text field ""']);
});

test("commands are read line by line from the input stream", async () => {
  const sink = createMemorySink();
  const input = new PassThrough();
  const renderer = createConsoleRenderer({ output: sink, input });
  renderer.mount(buildCounter(), HOST);
  sink.clear();

  input.write("click inc\nclick inc\n");
  await tick();
  const titles = sink.lines().filter((line) => line.includes("TextView#title"));
  assert.deepEqual(titles, [
    '  TextView#title "Count: 1" @(5,5) 300x20',
    '  TextView#title "Count: 2" @(5,5) 300x20',
  ]);

  input.write("quit\n");
  await tick();
  input.end();
  renderer.close();
});
