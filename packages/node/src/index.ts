import {
  type Application,
  type ApplicationConfig,
  type Logger,
  type Renderer,
  createApplication,
} from "@droidlet/core";
import { createNodeLogger } from "./logger.js";
import { createConsoleRenderer } from "./renderer/consoleRenderer.js";

export {
  type LogSink,
  type NodeLogFormat,
  type NodeLogLevel,
  type NodeLoggerOptions,
  createNodeLogger,
  formatJsonRecord,
  formatTextRecord,
  resolveLogFormat,
  resolveLogLevel,
} from "./logger.js";
export {
  type ConsoleCommandResult,
  type ConsoleRenderer,
  type ConsoleRendererOptions,
  type OutputSink,
  createConsoleRenderer,
  formatRenderTree,
} from "./renderer/consoleRenderer.js";
export { type RendererLoader, resolveRenderer } from "./renderer/resolveRenderer.js";
export {
  type FileStore,
  type FileStoreOptions,
  type StoreResult,
  createFileStore,
} from "./storage/fileStore.js";
export {
  CLIENT_VERSION,
  type FetchFn,
  type HttpClient,
  type HttpClientOptions,
  type HttpHeaders,
  type HttpResult,
  createHttpClient,
  mergeHeaders,
} from "./net/httpClient.js";

export type NodeApplicationConfig = Readonly<
  Omit<ApplicationConfig, "logger" | "renderer"> & {
    logger?: Logger;
    /**
     * Renderer to mount in GUI mode. Omit for the console renderer on
     * process.stdout; pass `null` to run without one (console mode).
     */
    renderer?: Renderer | null;
    /** Read `click <id>` commands from process.stdin with the default renderer. */
    interactive?: boolean;
  }
>;

/**
 * Create an Application wired for Node: a stderr logger and, unless another
 * renderer (or `null`) is given, the console renderer.
 */
export function createNodeApplication(config: NodeApplicationConfig): Application {
  const logger = config.logger ?? createNodeLogger({ scope: "Droidlet" });
  const renderer =
    config.renderer !== undefined
      ? config.renderer
      : createConsoleRenderer({
          output: process.stdout,
          logger,
          ...(config.interactive === true ? { input: process.stdin } : {}),
        });
  return createApplication({
    appName: config.appName,
    packageName: config.packageName,
    ...(config.gui === undefined ? {} : { gui: config.gui }),
    renderer,
    logger,
  });
}
