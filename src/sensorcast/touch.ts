import type { EventDispatcher } from "./dispatcher.js";
import type { Logger, TouchEvent } from "./domain.js";
import { touchEvent } from "./payloads.js";
import type { SerialTaskQueue } from "./task-queue.js";

export interface TouchStream {
  publish(event: TouchEvent): Promise<void>;
}

/**
 * Touch is an ambient control signal: every open connection receives it,
 * whatever it subscribed to. Events pass through the `touch` lane so a
 * DOWN/MOVE/UP sequence reaches each socket in the order it was produced.
 */
export function createTouchStream(params: {
  dispatcher: EventDispatcher;
  queue: SerialTaskQueue;
  logger?: Logger;
}): TouchStream {
  const { dispatcher, queue, logger } = params;

  async function publish(event: TouchEvent): Promise<void> {
    if (!Number.isFinite(event.x) || !Number.isFinite(event.y)) {
      logger?.warn("touch_event_rejected", { action: event.action });
      return;
    }
    const report = await queue.run("touch", () => dispatcher.broadcast(touchEvent(event)));
    const { failed } = await report.settled;
    if (failed > 0) {
      logger?.debug?.("touch_delivery_partial", { matched: report.matched, failed });
    }
  }

  return { publish };
}
