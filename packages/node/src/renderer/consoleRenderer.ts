/**
 * packages/node/src/renderer/consoleRenderer.ts — Terminal outline renderer.
 *
 * Prints the mounted activity's render trees as an indented outline and,
 * when given an input stream, reads one command per line:
 *
 *   click <id>          dispatch a click to the first clickable view with that id, then redraw
 *   type <id> <text>    set the text of the first EditText with that id, then redraw
 *   render              redraw
 *   quit | exit         stop reading input
 */

import { createInterface, type Interface } from "node:readline";
import {
  type Activity,
  type EditText,
  type HostInfo,
  type Logger,
  type Padding,
  type RenderedNode,
  type Renderer,
  type View,
  dispatchClick,
  isRenderedLayout,
  isView,
  noopLogger,
  renderActivity,
  walkNodes,
} from "@droidlet/core";

export type OutputSink = Readonly<{ write: (chunk: string) => unknown }>;

export type ConsoleRendererOptions = Readonly<{
  output: OutputSink;
  input?: NodeJS.ReadableStream;
  logger?: Logger;
}>;

export type ConsoleCommandResult =
  | "rendered"
  | "clicked"
  | "typed"
  | "ignored"
  | "closed"
  | "unknown";

export interface ConsoleRenderer extends Renderer {
  /** Execute one input line against the mounted activity. */
  handleCommand(line: string): ConsoleCommandResult;
  /** Redraw the mounted activity. No-op before mount. */
  redraw(): void;
  /** Stop reading input. Idempotent. */
  close(): void;
}

const INDENT = "  ";
const USAGE = "use: click <id> | type <id> <text> | render | quit";
const TYPE_RE = /^type\s+(\S+)(?:\s(.*))?$/u;

function isEditText(view: View): view is EditText {
  return view.kind === "EditText";
}

function findEditText(activity: Activity, id: string): EditText | null {
  let found: EditText | null = null;
  walkNodes(activity.views.values(), (node) => {
    if (node.id !== id || !isView(node) || !isEditText(node)) return true;
    found = node;
    return false;
  });
  return found;
}

function quote(text: string): string {
  return JSON.stringify(text);
}

function formatPadding(p: Padding): string {
  return `pad(${p.left},${p.top},${p.right},${p.bottom})`;
}

function formatNodeLine(node: RenderedNode): string {
  const geometry = `@(${node.position.x},${node.position.y}) ${node.size.width}x${node.size.height}`;
  switch (node.kind) {
    case "LinearLayout":
      return `LinearLayout#${node.id} ${node.orientation} ${geometry} ${formatPadding(node.padding)}`;
    case "RelativeLayout":
      return `RelativeLayout#${node.id} ${geometry} ${formatPadding(node.padding)}`;
    case "TextView":
    case "Button":
    case "EditText": {
      const label =
        node.kind === "EditText" && node.text.length === 0
          ? `hint=${quote(node.hint)}`
          : quote(node.text);
      const flags = `${node.visible ? "" : " [hidden]"}${node.enabled ? "" : " [disabled]"}`;
      return `${node.kind}#${node.id} ${label} ${geometry}${flags}`;
    }
  }
}

/**
 * Format render trees as an indented outline, one node per line, children
 * indented two spaces under their layout.
 */
export function formatRenderTree(roots: readonly RenderedNode[]): string {
  const lines: string[] = [];
  const visit = (node: RenderedNode, depth: number): void => {
    lines.push(`${INDENT.repeat(depth)}${formatNodeLine(node)}`);
    if (isRenderedLayout(node)) {
      for (const child of node.children) visit(child, depth + 1);
    }
  };
  for (const root of roots) visit(root, 0);
  return lines.join("\n");
}

export function createConsoleRenderer(opts: ConsoleRendererOptions): ConsoleRenderer {
  const output = opts.output;
  const logger = (opts.logger ?? noopLogger).child("ConsoleRenderer");
  let mounted: Readonly<{ activity: Activity; host: HostInfo }> | null = null;
  let rl: Interface | null = null;

  const redraw = (): void => {
    if (mounted === null) return;
    const { activity, host } = mounted;
    const body = formatRenderTree(renderActivity(activity));
    output.write(`== ${host.appName} / ${activity.name} ==\n${body.length > 0 ? `${body}\n` : ""}`);
  };

  const close = (): void => {
    const current = rl;
    if (current === null) return;
    rl = null;
    current.close();
  };

  const handleCommand = (line: string): ConsoleCommandResult => {
    const trimmed = line.trim();
    if (trimmed.length === 0) return "ignored";
    if (mounted === null) return "ignored";
    const [command, ...rest] = trimmed.split(/\s+/u);
    switch (command) {
      case "render":
        redraw();
        return "rendered";
      case "quit":
      case "exit":
        close();
        return "closed";
      case "click": {
        const id = rest.join(" ");
        if (dispatchClick(mounted.activity, id)) {
          logger.debug(`click dispatched to ${id}`);
          redraw();
          return "clicked";
        }
        output.write(`no enabled clickable view "${id}"\n`);
        return "ignored";
      }
      case "type": {
        const match = TYPE_RE.exec(trimmed);
        const id = match?.[1];
        const field = id === undefined ? null : findEditText(mounted.activity, id);
        if (id === undefined || field === null) {
          output.write(`no text field "${id ?? ""}"\n`);
          return "ignored";
        }
        field.setText(match?.[2] ?? "");
        redraw();
        return "typed";
      }
      default:
        output.write(`unknown command "${command ?? ""}" (${USAGE})\n`);
        return "unknown";
    }
  };

  return Object.freeze({
    name: "console",

    mount(activity: Activity, host: HostInfo): void {
      close();
      mounted = Object.freeze({ activity, host });
      redraw();
      if (opts.input === undefined) return;
      const reader = createInterface({ input: opts.input, terminal: false });
      rl = reader;
      reader.on("line", (line: string) => {
        handleCommand(line);
      });
      reader.on("close", () => {
        if (rl === reader) rl = null;
        logger.info("input closed");
      });
    },

    handleCommand,
    redraw,
    close,
  });
}
