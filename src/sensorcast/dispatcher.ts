import type {
  Attachment,
  CapabilityEvent,
  Connection,
  DeliveryShape,
  Logger,
  SendResult,
} from "./domain.js";
import type { SubscriptionRegistry } from "./registry.js";

export type DispatchReport = {
  capability: string;
  matched: number;
  /** Serializations performed; at most one per delivery shape. */
  serializations: number;
  /** Settles once every write of the batch has been flushed or failed. */
  settled: Promise<{ delivered: number; failed: number }>;
};

export interface EventDispatcher {
  dispatch(event: CapabilityEvent): DispatchReport;
  /** Sends to every open connection regardless of attachment. */
  broadcast(event: CapabilityEvent): DispatchReport;
  unicast(connection: Connection, event: CapabilityEvent): Promise<SendResult>;
}

/** List-attached connections need the capability name on every frame. */
export function deliveryShapeOf(attachment: Attachment): DeliveryShape {
  return attachment.type === "list" ? "tagged" : "bare";
}

export function serializeEvent(event: CapabilityEvent, shape: DeliveryShape): string {
  if (shape === "tagged") {
    return JSON.stringify({ ...event.payload, type: event.capability });
  }
  return JSON.stringify(event.payload);
}

export function createEventDispatcher(params: {
  registry: SubscriptionRegistry;
  logger?: Logger;
}): EventDispatcher {
  const { registry, logger } = params;

  function write(connection: Connection, data: string, capability: string): Promise<SendResult> {
    if (!connection.isOpen()) {
      return Promise.resolve({ ok: false, error: new Error("socket not open") });
    }
    return connection.send(data).then((result) => {
      if (!result.ok) {
        logger?.warn("dispatch_write_failed", {
          capability,
          connectionId: connection.id,
          error: result.error.message,
        });
      }
      return result;
    });
  }

  function deliver(
    event: CapabilityEvent,
    targets: Connection[],
    shapeFor: (connection: Connection) => DeliveryShape,
  ): DispatchReport {
    const frames = new Map<DeliveryShape, string>();
    const writes: Promise<SendResult>[] = [];
    for (const connection of targets) {
      const shape = shapeFor(connection);
      let frame = frames.get(shape);
      if (frame === undefined) {
        frame = serializeEvent(event, shape);
        frames.set(shape, frame);
      }
      writes.push(write(connection, frame, event.capability));
    }
    const settled = Promise.all(writes).then((results) => {
      const delivered = results.filter((result) => result.ok).length;
      return { delivered, failed: results.length - delivered };
    });
    return {
      capability: event.capability,
      matched: targets.length,
      serializations: frames.size,
      settled,
    };
  }

  function dispatch(event: CapabilityEvent): DispatchReport {
    const targets = registry.connectionsFor(event.capability);
    return deliver(event, targets, (connection) => {
      const attachment = registry.attachmentOf(connection);
      return attachment ? deliveryShapeOf(attachment) : "bare";
    });
  }

  function broadcast(event: CapabilityEvent): DispatchReport {
    const targets = registry.allConnections().filter((connection) => connection.isOpen());
    return deliver(event, targets, () => "bare");
  }

  function unicast(connection: Connection, event: CapabilityEvent): Promise<SendResult> {
    const attachment = registry.attachmentOf(connection);
    const shape = attachment ? deliveryShapeOf(attachment) : "bare";
    return write(connection, serializeEvent(event, shape), event.capability);
  }

  return { dispatch, broadcast, unicast };
}
