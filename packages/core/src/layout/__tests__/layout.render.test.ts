import { assert, describe, test } from "@droidlet/testkit";
import { createButton, createEditText, createTextView } from "../../views/widgets.js";
import { createLinearLayout, createRelativeLayout } from "../layout.js";

describe("layout › render", () => {
  test("LinearLayout render arranges then describes children in order", () => {
    const layout = createLinearLayout("main", "vertical");
    layout.setPadding(5, 5, 5, 5);
    layout.addView(createTextView("title", "Counter", { width: 100, height: 20 }));
    layout.addView(createButton("inc", "+", { width: 40, height: 30 }));

    const out = layout.render();
    assert.equal(out.kind, "LinearLayout");
    assert.equal(out.kind === "LinearLayout" ? out.orientation : null, "vertical");
    assert.equal(out.id, "main");
    assert.deepEqual(out.padding, { left: 5, top: 5, right: 5, bottom: 5 });
    assert.deepEqual(
      out.children.map((c) => [c.kind, c.id, c.position.x, c.position.y]),
      [
        ["TextView", "title", 5, 5],
        ["Button", "inc", 5, 35],
      ],
    );
  });

  test("RelativeLayout never moves children, however often it renders", () => {
    const layout = createRelativeLayout("free");
    const a = createTextView("a", "", { x: 12, y: 34, width: 10, height: 10 });
    const b = createEditText("b", "", { x: 0, y: 0 });
    b.setPosition(7, 3);
    layout.addView(a);
    layout.addView(b);
    for (let i = 0; i < 3; i++) layout.render();
    assert.deepEqual(a.position, { x: 12, y: 34 });
    assert.deepEqual(b.position, { x: 7, y: 3 });
    const out = layout.render();
    assert.deepEqual(
      out.children.map((c) => c.position),
      [
        { x: 12, y: 34 },
        { x: 7, y: 3 },
      ],
    );
  });

  test("snapshot does not arrange", () => {
    const layout = createLinearLayout("main");
    const a = createTextView("a", "", { height: 10 });
    const b = createTextView("b", "", { x: 9, y: 9, height: 10 });
    layout.addView(a);
    layout.addView(b);
    const snap = layout.snapshot();
    assert.deepEqual(b.position, { x: 9, y: 9 });
    assert.deepEqual(snap.children[1]?.position, { x: 9, y: 9 });
    layout.arrange();
    assert.deepEqual(layout.snapshot().children[1]?.position, { x: 0, y: 20 });
  });

  test("render arranges nested layouts; snapshot leaves them alone", () => {
    const outer = createRelativeLayout("outer");
    const inner = createLinearLayout("inner", "horizontal");
    const a = createTextView("a", "", { width: 15 });
    const b = createTextView("b", "", { x: 1, y: 1, width: 15 });
    inner.addView(a);
    inner.addView(b);
    outer.addView(inner);

    outer.snapshot();
    assert.deepEqual(b.position, { x: 1, y: 1 });

    const out = outer.render();
    assert.deepEqual(b.position, { x: 25, y: 0 });
    const renderedInner = out.children[0];
    assert.ok(renderedInner !== undefined && renderedInner.kind === "LinearLayout");
    if (renderedInner?.kind !== "LinearLayout") return;
    assert.deepEqual(renderedInner.children[1]?.position, { x: 25, y: 0 });
  });

  test("render output is frozen and does not change when the tree does", () => {
    const layout = createLinearLayout("main");
    const a = createTextView("a", "x", { height: 5 });
    layout.addView(a);
    const out = layout.render();
    layout.addView(createTextView("b"));
    a.setText("y");
    assert.equal(Object.isFrozen(out), true);
    assert.equal(Object.isFrozen(out.children), true);
    assert.equal(out.children.length, 1);
    const first = out.children[0];
    assert.equal(first?.kind === "TextView" ? first.text : null, "x");
  });

  test("render output is JSON-serializable", () => {
    const layout = createLinearLayout("main");
    layout.addView(createButton("ok", "OK", { width: 10, height: 10, onClick: () => {} }));
    const out = layout.render();
    assert.deepEqual(JSON.parse(JSON.stringify(out)), out);
  });

  test("layout geometry is reported in the description", () => {
    const layout = createRelativeLayout("r", { x: 2, y: 3, width: 40, height: 50 });
    const out = layout.render();
    assert.deepEqual(out.position, { x: 2, y: 3 });
    assert.deepEqual(out.size, { width: 40, height: 50 });
    assert.deepEqual(out.children, []);
  });
});
