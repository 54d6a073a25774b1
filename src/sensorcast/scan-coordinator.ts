/**
 * Scan coordination
 *
 * WiFi visibility scans and Bluetooth discovery are expensive, so each radio
 * only cycles while at least one connection holds a scan capability that
 * needs it. Per radio:
 *
 *   idle --request--> requested --onScanStarted--> inFlight --onScanCompleted--> idle
 *
 * A repeating timer requests a cycle every `intervalMs`; a tick that finds the
 * radio anywhere but idle does nothing, so cycles never overlap.
 */
import { BLUETOOTH_SCAN, NETWORK_SCAN, SCAN_RADIOS, WIFI_SCAN } from "./capabilities.js";
import type {
  BluetoothScanResult,
  CapabilityEvent,
  Logger,
  RadioScanResults,
  ScanKind,
  ScanRadio,
  ScanSource,
  ScanSourceListener,
  ScanStartResult,
  WifiScanResult,
} from "./domain.js";
import { describeError } from "./errors.js";
import { bluetoothScanEvent, networkScanEvent, wifiScanEvent } from "./payloads.js";
import type { CapabilityHandle } from "./registry.js";

export const DEFAULT_SCAN_INTERVAL_MS = 15_000;

export type ScanCycleStatus = "idle" | "requested" | "inFlight";

type RadioState = {
  status: ScanCycleStatus;
  timer: NodeJS.Timeout | null;
};

export type ScanCycleSnapshot = {
  status: ScanCycleStatus;
  running: boolean;
};

export interface ScanCoordinator {
  activate(kind: ScanKind): CapabilityHandle;
  snapshot(radio: ScanRadio): ScanCycleSnapshot;
  activeKinds(): ScanKind[];
  stop(): void;
}

export function createScanCoordinator(params: {
  scans: ScanSource;
  emit: (event: CapabilityEvent) => void;
  intervalMs?: number;
  logger?: Logger;
  /** Serialization point for source callbacks and timer ticks. Defaults to running inline. */
  runSerial?: (task: () => void) => void;
  now?: () => number;
}): ScanCoordinator {
  const { scans, emit, logger } = params;
  const intervalMs = params.intervalMs ?? DEFAULT_SCAN_INTERVAL_MS;
  const runSerial = params.runSerial ?? ((task: () => void) => task());
  const now = params.now ?? Date.now;

  const activeKinds = new Set<ScanKind>();
  const radios: Record<ScanRadio, RadioState> = {
    wifi: { status: "idle", timer: null },
    bluetooth: { status: "idle", timer: null },
  };
  let lastWifi: WifiScanResult[] = [];
  let lastBluetooth: BluetoothScanResult[] = [];

  function demandFor(radio: ScanRadio): number {
    let demand = 0;
    for (const kind of activeKinds) {
      if (SCAN_RADIOS[kind].includes(radio)) {
        demand += 1;
      }
    }
    return demand;
  }

  function requestCycle(radio: ScanRadio) {
    const state = radios[radio];
    if (state.timer === null) {
      return;
    }
    if (state.status !== "idle") {
      logger?.debug?.("scan_tick_skipped", { radio, status: state.status });
      return;
    }
    state.status = "requested";
    let result: ScanStartResult;
    try {
      result = scans.startScan(radio);
    } catch (err) {
      result = { started: false, reason: describeError(err) };
    }
    if (!result.started) {
      // Radio off or permission revoked: stay quiet towards clients and retry next tick.
      if (state.status === "requested") {
        state.status = "idle";
      }
      logger?.warn("scan_start_unavailable", { radio, reason: result.reason });
    }
  }

  function startRadio(radio: ScanRadio) {
    const state = radios[radio];
    if (state.timer !== null) {
      return;
    }
    state.timer = setInterval(() => runSerial(() => requestCycle(radio)), intervalMs);
    state.timer.unref?.();
    logger?.info("scan_cycle_started", { radio, intervalMs });
    requestCycle(radio);
  }

  function stopRadio(radio: ScanRadio) {
    const state = radios[radio];
    if (state.timer === null) {
      return;
    }
    clearInterval(state.timer);
    state.timer = null;
    if (state.status !== "idle") {
      try {
        scans.cancelScan(radio);
      } catch (err) {
        logger?.warn("scan_cancel_failed", {
          radio,
          error: describeError(err),
        });
      }
    }
    state.status = "idle";
    if (radio === "wifi") {
      lastWifi = [];
    } else {
      lastBluetooth = [];
    }
    logger?.info("scan_cycle_stopped", { radio });
  }

  function emitResults(completion: RadioScanResults) {
    const timestamp = now();
    if (completion.radio === "wifi") {
      lastWifi = completion.results;
      if (activeKinds.has(WIFI_SCAN)) {
        emit(wifiScanEvent(completion.results, timestamp));
      }
    } else {
      lastBluetooth = completion.results;
      if (activeKinds.has(BLUETOOTH_SCAN)) {
        emit(bluetoothScanEvent(completion.results, timestamp));
      }
    }
    if (activeKinds.has(NETWORK_SCAN)) {
      emit(
        networkScanEvent({
          timestamp,
          wifiResults: lastWifi,
          bluetoothResults: lastBluetooth,
        }),
      );
    }
  }

  const listener: ScanSourceListener = {
    onScanStarted(radio) {
      runSerial(() => {
        const state = radios[radio];
        if (state.timer === null) {
          return;
        }
        state.status = "inFlight";
      });
    },
    onScanCompleted(completion) {
      runSerial(() => {
        const state = radios[completion.radio];
        if (state.timer === null) {
          logger?.debug?.("scan_result_dropped", { radio: completion.radio });
          return;
        }
        state.status = "idle";
        logger?.info("scan_cycle_completed", {
          radio: completion.radio,
          results: completion.results.length,
        });
        emitResults(completion);
      });
    },
    onScanFailed(radio, reason) {
      runSerial(() => {
        const state = radios[radio];
        if (state.timer === null) {
          return;
        }
        state.status = "idle";
        logger?.warn("scan_cycle_failed", { radio, reason });
      });
    },
  };
  scans.setListener(listener);

  function activate(kind: ScanKind): CapabilityHandle {
    if (activeKinds.has(kind)) {
      throw new Error(`scan capability ${kind} is already active`);
    }
    activeKinds.add(kind);
    for (const radio of SCAN_RADIOS[kind]) {
      if (demandFor(radio) === 1) {
        startRadio(radio);
      }
    }
    let released = false;
    return {
      release() {
        if (released) {
          return;
        }
        released = true;
        activeKinds.delete(kind);
        for (const radio of SCAN_RADIOS[kind]) {
          if (demandFor(radio) === 0) {
            stopRadio(radio);
          }
        }
      },
    };
  }

  function stop() {
    activeKinds.clear();
    stopRadio("wifi");
    stopRadio("bluetooth");
    scans.setListener(null);
  }

  return {
    activate,
    snapshot: (radio) => ({ status: radios[radio].status, running: radios[radio].timer !== null }),
    activeKinds: () => Array.from(activeKinds),
    stop,
  };
}
