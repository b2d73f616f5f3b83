import {
  Activity,
  type ActivityContext,
  type EditText,
  type TextView,
  createEditText,
  createLinearLayout,
  createTextView,
  widgets,
} from "@droidlet/core";

const POSITIVE_COLOR = "#4CAF50";
const NEGATIVE_COLOR = "#F44336";
const ZERO_COLOR = "#000000";

const INTEGER_RE = /^[+-]?\d+$/;

export class CounterActivity extends Activity {
  private _count = 0;
  private _counterText: TextView | null = null;
  private _input: EditText | null = null;

  constructor(context: ActivityContext) {
    super("MainActivity", context);
  }

  get count(): number {
    return this._count;
  }

  protected override onStart(): void {
    this.logger.info("MainActivity starting");

    const layout = createLinearLayout("main_layout", "vertical");
    layout.setPadding(20, 20, 20, 20);

    const title = createTextView("title_text", "Droidlet Counter", { width: 300, height: 50 });
    title.setTextColor("#2196F3");
    title.setTextSize(20);

    const counterText = createTextView("counter_text", `Counter: ${this._count}`, {
      width: 300,
      height: 40,
    });
    counterText.setTextSize(16);
    this._counterText = counterText;

    const input = createEditText("custom_input", "Enter custom increment value", {
      width: 300,
      height: 50,
    });
    this._input = input;

    const size = { width: 200, height: 50 };
    layout.addView(title);
    layout.addView(counterText);
    layout.addView(
      widgets.button("increment_btn", "Increment (+)", () => this.increment(1), {
        ...size,
        backgroundColor: "#4CAF50",
      }),
    );
    layout.addView(
      widgets.button("decrement_btn", "Decrement (-)", () => this.increment(-1), {
        ...size,
        backgroundColor: "#F44336",
      }),
    );
    layout.addView(
      widgets.button("reset_btn", "Reset", () => this.reset(), {
        ...size,
        backgroundColor: "#FF9800",
      }),
    );
    layout.addView(input);
    layout.addView(
      widgets.button("custom_btn", "Custom Increment", () => this.incrementByInput(), {
        ...size,
        backgroundColor: "#9C27B0",
      }),
    );

    this.addView("main_layout", layout);
    this.logger.info("UI initialized successfully");
  }

  protected override onResume(): void {
    this.logger.info("MainActivity resumed");
  }

  protected override onPause(): void {
    this.logger.info("MainActivity paused");
  }

  protected override onStop(): void {
    this.logger.info("MainActivity stopped");
  }

  private increment(delta: number): void {
    this._count += delta;
    this.updateDisplay();
    this.logger.info(`Counter ${delta > 0 ? "incremented" : "decremented"} to ${this._count}`);
  }

  private reset(): void {
    this._count = 0;
    this.updateDisplay();
    this.logger.info("Counter reset to 0");
  }

  private incrementByInput(): void {
    const input = this._input;
    if (input === null) return;
    const raw = input.getText().trim();
    if (!INTEGER_RE.test(raw)) {
      this.logger.warn("Invalid input for custom increment");
      return;
    }
    const value = Number.parseInt(raw, 10);
    this._count += value;
    this.updateDisplay();
    input.setText("");
    this.logger.info(`Counter incremented by ${value} to ${this._count}`);
  }

  private updateDisplay(): void {
    const text = this._counterText;
    if (text === null) return;
    text.setText(`Counter: ${this._count}`);
    text.setTextColor(this._count > 0 ? POSITIVE_COLOR : this._count < 0 ? NEGATIVE_COLOR : ZERO_COLOR);
  }
}
