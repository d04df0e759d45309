/**
 * Handler table.
 *
 * Order matters: discovery assigns each raw device to the first handler
 * that matches it.
 */

import type { DeviceHandler, HandlerFactory } from "../core/handler.js";
import type { Clock } from "../core/poll.js";
import type { HidBackend } from "../hid/transport.js";
import type { Logger } from "../utils/logger.js";
import type { AppConfig } from "../config.js";
import { TanchjimHandler, TANCHJIM_DSP, rawPregainVariant } from "./tanchjim.js";
import { QudelixHandler } from "./qudelix.js";
import { MoondropHandler } from "./moondrop.js";

export { TanchjimHandler } from "./tanchjim.js";
export { QudelixHandler } from "./qudelix.js";
export { MoondropHandler } from "./moondrop.js";

export interface HandlerEnvironment {
  backend: HidBackend;
  clock?: Clock;
  logger?: Logger;
  config: Pick<AppConfig, "tanchjimRawPregainModels">;
}

function factory(create: () => DeviceHandler): HandlerFactory {
  return { create };
}

export function createDefaultHandlerFactories(env: HandlerEnvironment): HandlerFactory[] {
  const { backend, clock, config } = env;
  const log = (scope: string) => env.logger?.child(scope);
  const factories: HandlerFactory[] = [];

  // Sub-models with unscaled pregain are matched before the catch-all keywords
  if (config.tanchjimRawPregainModels.length > 0) {
    const variant = rawPregainVariant(config.tanchjimRawPregainModels);
    factories.push(factory(() => new TanchjimHandler({ backend, clock, logger: log("tanchjim"), variant })));
  }
  factories.push(
    factory(() => new TanchjimHandler({ backend, clock, logger: log("tanchjim"), variant: TANCHJIM_DSP })),
    factory(() => new QudelixHandler({ backend, clock, logger: log("qudelix") })),
    factory(() => new MoondropHandler({ backend, clock, logger: log("moondrop") })),
  );
  return factories;
}
