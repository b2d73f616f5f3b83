/**
 * packages/node/src/renderer/resolveRenderer.ts — Optional renderer loading.
 *
 * A renderer that cannot be loaded (missing package, failing initializer) is
 * a configuration state: the host runs in console mode. Resolve once at
 * startup and pass the result as `renderer`.
 *
 * @example
 * ```ts
 * const renderer = await resolveRenderer(
 *   async () => (await import("my-gui-renderer")).createRenderer(),
 *   logger,
 * );
 * const app = createNodeApplication({ appName, packageName, renderer });
 * ```
 */

import { type Logger, type Renderer, noopLogger } from "@droidlet/core";

export type RendererLoader = () => Renderer | Promise<Renderer>;

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function resolveRenderer(
  load: RendererLoader,
  logger: Logger = noopLogger,
): Promise<Renderer | null> {
  try {
    const renderer = await load();
    logger.info(`Renderer loaded: ${renderer.name}`);
    return renderer;
  } catch (err) {
    logger.warn(`Renderer not available (${describeError(err)}). Running in console mode.`);
    return null;
  }
}
