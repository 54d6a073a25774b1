import { LOCATION_CAPABILITY } from "./capabilities.js";
import type {
  CapabilityEvent,
  Connection,
  LocationFix,
  LocationSource,
  LocationSubscription,
  Logger,
  SendResult,
} from "./domain.js";
import { describeError } from "./errors.js";
import { locationEvent } from "./payloads.js";
import type { CapabilityHandle } from "./registry.js";

export const DEFAULT_LOCATION_POLL_MS = 500;
export const DEFAULT_MAX_ACCURACY_METERS = 10;
export const LAST_KNOWN_LOCATION_REQUEST = "getlastknownlocation";

export interface LocationStream {
  activate(): CapabilityHandle;
  isActive(): boolean;
  /** Answers one connection with the last known fix; sends nothing when there is none. */
  sendLastKnown(connection: Connection): Promise<boolean>;
  /** Returns true when the message was a location request. */
  handleMessage(connection: Connection, text: string, capabilities: string[]): boolean;
  stop(): void;
}

export function isLastKnownLocationRequest(text: string): boolean {
  return text.trim().toLowerCase() === LAST_KNOWN_LOCATION_REQUEST;
}

/**
 * Location is pushed by the source, but some platforms push rarely or stop
 * while the radio idles. While any connection holds `gps`, a fixed-interval
 * poll re-reads the last known fix and re-broadcasts it.
 */
export function createLocationStream(params: {
  location: LocationSource;
  emit: (event: CapabilityEvent) => void;
  reply: (connection: Connection, event: CapabilityEvent) => Promise<SendResult>;
  pollIntervalMs?: number;
  maxAccuracyMeters?: number | null;
  logger?: Logger;
  runSerial?: (task: () => void) => void;
}): LocationStream {
  const { location, emit, reply, logger } = params;
  const pollIntervalMs = params.pollIntervalMs ?? DEFAULT_LOCATION_POLL_MS;
  const maxAccuracyMeters =
    params.maxAccuracyMeters === undefined ? DEFAULT_MAX_ACCURACY_METERS : params.maxAccuracyMeters;
  const runSerial = params.runSerial ?? ((task: () => void) => task());

  let subscription: LocationSubscription | null = null;
  let pollTimer: NodeJS.Timeout | null = null;
  let polling = false;

  function onFix(fix: LocationFix) {
    if (subscription === null) {
      return;
    }
    if (maxAccuracyMeters !== null && fix.accuracy > maxAccuracyMeters) {
      logger?.debug?.("location_fix_filtered", { accuracy: fix.accuracy, maxAccuracyMeters });
      return;
    }
    emit(locationEvent(fix));
  }

  async function readLastKnown(): Promise<LocationFix | null> {
    try {
      return await location.getLastKnownLocation();
    } catch (err) {
      logger?.warn("location_last_known_failed", { error: describeError(err) });
      return null;
    }
  }

  function poll() {
    if (polling) {
      return;
    }
    polling = true;
    void readLastKnown()
      .then((fix) => {
        if (fix && pollTimer !== null) {
          runSerial(() => emit(locationEvent(fix, true)));
        }
      })
      .finally(() => {
        polling = false;
      });
  }

  function deactivate() {
    if (pollTimer !== null) {
      clearInterval(pollTimer);
      pollTimer = null;
    }
    if (subscription !== null) {
      const current = subscription;
      subscription = null;
      try {
        current.cancel();
      } catch (err) {
        logger?.warn("location_cancel_failed", { error: describeError(err) });
      }
      logger?.info("location_updates_stopped");
    }
  }

  function activate(): CapabilityHandle {
    if (subscription !== null) {
      throw new Error("location updates are already active");
    }
    subscription = location.requestUpdates((fix) => runSerial(() => onFix(fix)));
    pollTimer = setInterval(poll, pollIntervalMs);
    pollTimer.unref?.();
    logger?.info("location_updates_started", { pollIntervalMs });
    let released = false;
    return {
      release() {
        if (released) {
          return;
        }
        released = true;
        deactivate();
      },
    };
  }

  async function sendLastKnown(connection: Connection): Promise<boolean> {
    const fix = await readLastKnown();
    if (!fix) {
      logger?.debug?.("location_last_known_unavailable", { connectionId: connection.id });
      return false;
    }
    const result = await reply(connection, locationEvent(fix, true));
    return result.ok;
  }

  function handleMessage(connection: Connection, text: string, capabilities: string[]): boolean {
    if (!isLastKnownLocationRequest(text) || !capabilities.includes(LOCATION_CAPABILITY)) {
      return false;
    }
    void sendLastKnown(connection);
    return true;
  }

  return {
    activate,
    isActive: () => subscription !== null,
    sendLastKnown,
    handleMessage,
    stop: deactivate,
  };
}
