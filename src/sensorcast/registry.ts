import { capabilitiesOf } from "./capabilities.js";
import type { Attachment, Capability, Connection, Logger } from "./domain.js";
import { describeError } from "./errors.js";

/** Live producer behind a capability; released when the last subscriber leaves. */
export interface CapabilityHandle {
  release(): void;
}

export interface CapabilityActivator {
  activate(capability: Capability): CapabilityHandle;
}

type RegistryEntry = {
  capability: Capability;
  count: number;
  handle: CapabilityHandle;
};

export interface SubscriptionRegistry {
  attach(connection: Connection, attachment: Attachment): void;
  /** Returns false when the connection was not attached (already detached or never accepted). */
  detach(connection: Connection): boolean;
  connectionsFor(capability: string): Connection[];
  allConnections(): Connection[];
  attachmentOf(connection: Connection): Attachment | undefined;
  findConnection(id: string): Connection | undefined;
  referenceCount(capability: string): number;
  activeCapabilities(): string[];
  size(): number;
}

export function createSubscriptionRegistry(params: {
  activator: CapabilityActivator;
  logger?: Logger;
  onChange?: () => void;
}): SubscriptionRegistry {
  const { activator, logger, onChange } = params;

  const attachments = new Map<Connection, Attachment>();
  const connectionsById = new Map<string, Connection>();
  const entries = new Map<string, RegistryEntry>();
  const index = new Map<string, Set<Connection>>();

  function acquire(capability: Capability) {
    const entry = entries.get(capability.name);
    if (entry) {
      entry.count += 1;
      return;
    }
    // Activation can throw; nothing is recorded for this capability until it succeeds.
    const handle = activator.activate(capability);
    entries.set(capability.name, { capability, count: 1, handle });
    logger?.info("capability_activated", { capability: capability.name });
  }

  function release(name: string) {
    const entry = entries.get(name);
    if (!entry) {
      return;
    }
    entry.count -= 1;
    if (entry.count > 0) {
      return;
    }
    entries.delete(name);
    try {
      entry.handle.release();
    } catch (err) {
      logger?.error("capability_release_failed", { capability: name, error: describeError(err) });
    }
    logger?.info("capability_deactivated", { capability: name });
  }

  function addToIndex(name: string, connection: Connection) {
    let bucket = index.get(name);
    if (!bucket) {
      bucket = new Set();
      index.set(name, bucket);
    }
    bucket.add(connection);
  }

  function removeFromIndex(name: string, connection: Connection) {
    const bucket = index.get(name);
    if (!bucket) {
      return;
    }
    bucket.delete(connection);
    if (bucket.size === 0) {
      index.delete(name);
    }
  }

  function attach(connection: Connection, attachment: Attachment) {
    if (attachments.has(connection)) {
      throw new Error(`connection ${connection.id} is already attached`);
    }
    const capabilities = capabilitiesOf(attachment);
    const acquired: Capability[] = [];
    try {
      for (const capability of capabilities) {
        acquire(capability);
        acquired.push(capability);
      }
    } catch (err) {
      for (const capability of acquired) {
        release(capability.name);
      }
      throw err;
    }
    attachments.set(connection, attachment);
    connectionsById.set(connection.id, connection);
    for (const capability of capabilities) {
      addToIndex(capability.name, connection);
    }
    logger?.debug?.("connection_attached", {
      connectionId: connection.id,
      capabilities: capabilities.map((capability) => capability.name),
    });
    onChange?.();
  }

  function detach(connection: Connection): boolean {
    const attachment = attachments.get(connection);
    if (!attachment) {
      return false;
    }
    attachments.delete(connection);
    connectionsById.delete(connection.id);
    for (const capability of capabilitiesOf(attachment)) {
      removeFromIndex(capability.name, connection);
      release(capability.name);
    }
    logger?.debug?.("connection_detached", { connectionId: connection.id });
    onChange?.();
    return true;
  }

  function connectionsFor(capability: string): Connection[] {
    const bucket = index.get(capability);
    if (!bucket) {
      return [];
    }
    const result: Connection[] = [];
    for (const connection of bucket) {
      if (connection.isOpen()) {
        result.push(connection);
      }
    }
    return result;
  }

  return {
    attach,
    detach,
    connectionsFor,
    allConnections: () => Array.from(attachments.keys()),
    attachmentOf: (connection) => attachments.get(connection),
    findConnection: (id) => connectionsById.get(id),
    referenceCount: (capability) => entries.get(capability)?.count ?? 0,
    activeCapabilities: () => Array.from(entries.keys()),
    size: () => attachments.size,
  };
}
