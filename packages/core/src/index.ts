/**
 * @droidlet/core
 *
 * Runtime-agnostic TypeScript core for Droidlet.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 *
 * @see docs/guide/concepts.md
 */

// =============================================================================
// Errors
// =============================================================================

export {
  DroidletError,
  type DroidletErrorCode,
  type DroidletErrorDetails,
  isDroidletError,
} from "./errors.js";

// =============================================================================
// Logging port
// =============================================================================

export {
  type LogFields,
  type LogLevel,
  type Logger,
  LOG_LEVEL_RANK,
  joinScope,
  noopLogger,
} from "./logger.js";

// =============================================================================
// Views
// =============================================================================

export type { Geometry, Point, Size } from "./node.js";
export { NodeBase } from "./node.js";
export { DEFAULT_BACKGROUND_COLOR, View } from "./views/view.js";
export type {
  Button,
  ButtonContent,
  ClickListener,
  EditText,
  EditTextContent,
  TextLikeContent,
  TextView,
  TextViewContent,
  ViewContent,
  ViewKind,
  ViewOptions,
} from "./views/types.js";
export {
  BUTTON_DEFAULTS,
  EDIT_TEXT_DEFAULTS,
  TEXT_VIEW_DEFAULTS,
  createButton,
  createEditText,
  createTextView,
  widgets,
} from "./views/widgets.js";

// =============================================================================
// Layouts
// =============================================================================

export {
  Layout,
  type LinearLayout,
  type RelativeLayout,
  type UiNode,
  createLinearLayout,
  createRelativeLayout,
  isLayout,
  isView,
} from "./layout/layout.js";
export { arrangeChildren, arrangeLinear } from "./layout/arrange.js";
export {
  LINEAR_LAYOUT_GAP,
  type LayoutKind,
  type LayoutSpec,
  type LinearLayoutSpec,
  type Orientation,
  type Padding,
  type RelativeLayoutSpec,
  ZERO_PADDING,
} from "./layout/types.js";

// =============================================================================
// Render tree
// =============================================================================

export type {
  RenderedButton,
  RenderedEditText,
  RenderedLayout,
  RenderedLinearLayout,
  RenderedNode,
  RenderedRelativeLayout,
  RenderedTextView,
  RenderedView,
} from "./render/types.js";
export { isRenderedLayout } from "./render/types.js";
export { arrangeNode, findNodeById, renderNode, snapshotNode, walkNodes } from "./render/tree.js";

// =============================================================================
// Activity
// =============================================================================

export {
  Activity,
  type ActivityClass,
  type ActivityContext,
  type ActivityExtras,
  type ActivityFactory,
  type ActivityFactoryFn,
  type LifecycleEvent,
  type LifecycleListener,
  instantiateActivity,
  isActivityClass,
} from "./activity/activity.js";
export {
  ACTIVITY_TRANSITIONS,
  type ActivityState,
  LifecycleStateMachine,
  canTransition,
} from "./activity/stateMachine.js";
export { Intent } from "./activity/intent.js";

// =============================================================================
// Application host + renderer contract
// =============================================================================

export type { Application, ApplicationConfig } from "./app/types.js";
export {
  type ResolvedApplicationConfig,
  createApplication,
  resolveApplicationConfig,
} from "./app/createApplication.js";
export type { HostInfo, Renderer } from "./renderer/types.js";
export { collectClickTargets, dispatchClick, renderActivity } from "./renderer/activityTree.js";
