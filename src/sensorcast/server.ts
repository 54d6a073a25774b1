import http from "node:http";
import { randomUUID } from "node:crypto";

import WebSocket, { WebSocketServer } from "ws";

import { createSubsystemLogger } from "../logging.js";
import { capabilityNamesOf, LOCATION_CAPABILITY, listCapabilities } from "./capabilities.js";
import { defaultServerConfig } from "./config.js";
import { createEventDispatcher } from "./dispatcher.js";
import type {
  Attachment,
  CapabilityEvent,
  Connection,
  ConnectionSummary,
  Logger,
  SendResult,
  SensorServer,
  ServerConfig,
  ServerConfigInput,
  ServerOptions,
} from "./domain.js";
import {
  CloseCode,
  ConfigError,
  ConnectionRejectedError,
  describeError,
  truncateCloseReason,
} from "./errors.js";
import { createLocationStream } from "./location-stream.js";
import { sensorEvent } from "./payloads.js";
import { createSubscriptionRegistry, type CapabilityActivator } from "./registry.js";
import { resolveAttachment } from "./routing.js";
import { createScanCoordinator } from "./scan-coordinator.js";
import { createSerialTaskQueue } from "./task-queue.js";
import { createTouchStream } from "./touch.js";
import { deepMerge } from "./utils/deep-merge.js";

export const SERVER_STOPPED_REASON = "Server stopped";
export const CLOSED_BY_HOST_REASON = "Connection closed by host user";
const INTERNAL_ERROR_CODE = 1011;
const CLIENT_CLOSE_GRACE_MS = 2_000;
const SHUTDOWN_TIMEOUT_MS = 5_000;

function isLocalhost(address: string): boolean {
  return ["127.0.0.1", "::1", "localhost"].includes(address);
}

function mergeConfig(input?: ServerConfigInput): ServerConfig {
  return deepMerge(defaultServerConfig(), input);
}

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(body));
}

function wrapSocket(ws: WebSocket, request: http.IncomingMessage): Connection {
  return {
    id: randomUUID(),
    remoteAddress: request.socket.remoteAddress ?? "unknown",
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send(data) {
      return new Promise<SendResult>((resolve) => {
        try {
          ws.send(data, (err) => resolve(err ? { ok: false, error: err } : { ok: true }));
        } catch (err) {
          resolve({ ok: false, error: err instanceof Error ? err : new Error(describeError(err)) });
        }
      });
    },
    close(code, reason) {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, truncateCloseReason(reason));
      }
    },
  };
}

function summarize(connection: Connection, attachment: Attachment): ConnectionSummary {
  return {
    id: connection.id,
    remoteAddress: connection.remoteAddress,
    capabilities: capabilityNamesOf(attachment),
    attachment: attachment.type,
  };
}

export function createSensorServer(options: ServerOptions): SensorServer {
  const config = mergeConfig(options.config);
  const logger: Logger = options.logger ?? createSubsystemLogger("server");
  const { source } = options;

  if (!config.network.allowPublic && !isLocalhost(config.network.bindAddress)) {
    throw new ConfigError(
      "network.allowPublic",
      "network.allowPublic must be true to bind a non-localhost address",
    );
  }

  const queue = createSerialTaskQueue();

  function runHardware(task: () => void) {
    queue.run("hardware", task).catch((err: unknown) => {
      logger.error("hardware_task_failed", { error: describeError(err) });
    });
  }

  const emit = (event: CapabilityEvent) => {
    dispatcher.dispatch(event);
  };

  const scanCoordinator = createScanCoordinator({
    scans: source.scans,
    emit,
    intervalMs: config.scans.intervalMs,
    logger,
    runSerial: runHardware,
  });

  const locationStream = createLocationStream({
    location: source.location,
    emit,
    reply: (connection, event) => dispatcher.unicast(connection, event),
    pollIntervalMs: config.location.pollIntervalMs,
    maxAccuracyMeters: config.location.maxAccuracyMeters,
    logger,
    runSerial: runHardware,
  });

  const activator: CapabilityActivator = {
    activate(capability) {
      switch (capability.kind) {
        case "sensor": {
          const subscription = source.sensors.subscribe(
            capability.sensor,
            (sensor, reading) => runHardware(() => emit(sensorEvent(sensor, reading))),
            config.sensors.samplingPeriodUs,
          );
          return { release: () => subscription.unsubscribe() };
        }
        case "location":
          return locationStream.activate();
        case "scan":
          return scanCoordinator.activate(capability.name);
        case "touch":
          // Touch events are pushed by the host through publishTouch.
          return { release: () => undefined };
      }
    },
  };

  const registry = createSubscriptionRegistry({
    activator,
    logger,
    onChange: () => {
      if (!options.onConnectionsChange) {
        return;
      }
      try {
        options.onConnectionsChange(listConnections());
      } catch (err) {
        logger.warn("connections_listener_failed", { error: describeError(err) });
      }
    },
  });

  const dispatcher = createEventDispatcher({ registry, logger });
  const touchStream = createTouchStream({ dispatcher, queue, logger });

  function listConnections(): ConnectionSummary[] {
    const summaries: ConnectionSummary[] = [];
    for (const connection of registry.allConnections()) {
      const attachment = registry.attachmentOf(connection);
      if (attachment) {
        summaries.push(summarize(connection, attachment));
      }
    }
    return summaries;
  }

  let running = false;
  let stopped = false;

  const readBoundPort = () => {
    const addr = httpServer.address();
    if (!addr || typeof addr === "string") {
      return config.port;
    }
    return addr.port;
  };

  const httpServer = http.createServer((req, res) => {
    try {
      const parsedUrl = new URL(req.url ?? "/", "http://localhost");
      logger.debug?.("http_request_received", { method: req.method, path: parsedUrl.pathname });
      if (req.method === "GET" && parsedUrl.pathname === "/sensors") {
        sendJson(res, 200, listCapabilities(source.sensors));
        return;
      }
      if (req.method === "GET" && parsedUrl.pathname === "/wsport") {
        sendJson(res, 200, { portNo: readBoundPort() });
        return;
      }
      sendJson(res, 404, { error: "not_found", message: "Not found" });
    } catch (err) {
      logger.error("http_request_failed", { error: describeError(err) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "server_error", message: "Internal error" });
      } else {
        res.end();
      }
    }
  });

  const wss = new WebSocketServer({ noServer: true });

  // Every path is upgraded; routing decides afterwards so a bad path closes with 4002.
  httpServer.on("upgrade", (request, socket, head) => {
    if (!running) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  wss.on("connection", (ws: WebSocket, request: http.IncomingMessage) => {
    const connection = wrapSocket(ws, request);
    ws.on("error", (err) => {
      logger.warn("socket_error", { connectionId: connection.id, error: err.message });
    });
    if (!running) {
      connection.close(CloseCode.SERVER_STOPPED, SERVER_STOPPED_REASON);
      return;
    }

    let attachment: Attachment;
    try {
      attachment = resolveAttachment(request.url ?? "/", { source, logger });
    } catch (err) {
      if (err instanceof ConnectionRejectedError) {
        logger.info("connection_rejected", {
          remoteAddress: connection.remoteAddress,
          code: err.code,
          reason: err.message,
        });
        connection.close(err.code, err.message);
        return;
      }
      logger.error("connection_routing_failed", { error: describeError(err) });
      connection.close(INTERNAL_ERROR_CODE, "Internal error");
      return;
    }

    ws.on("close", () => {
      if (registry.detach(connection)) {
        logger.info("connection_closed", { connectionId: connection.id });
      }
    });

    try {
      registry.attach(connection, attachment);
    } catch (err) {
      logger.error("connection_attach_failed", {
        connectionId: connection.id,
        error: describeError(err),
      });
      connection.close(INTERNAL_ERROR_CODE, "Capability unavailable");
      return;
    }

    const capabilities = capabilityNamesOf(attachment);
    logger.info("connection_accepted", {
      connectionId: connection.id,
      remoteAddress: connection.remoteAddress,
      capabilities,
    });

    ws.on("message", (raw, isBinary) => {
      if (isBinary) {
        return;
      }
      const text = raw.toString();
      if (!locationStream.handleMessage(connection, text, capabilities)) {
        logger.debug?.("client_message_ignored", { connectionId: connection.id });
      }
    });

    if (capabilities.includes(LOCATION_CAPABILITY)) {
      void locationStream.sendLastKnown(connection);
    }
  });

  function stopEngines() {
    scanCoordinator.stop();
    locationStream.stop();
  }

  function waitForClients(timeoutMs: number) {
    if (wss.clients.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        for (const client of wss.clients) {
          client.terminate();
        }
        resolve();
      }, timeoutMs);
      const check = () => {
        if (wss.clients.size === 0) {
          clearTimeout(timer);
          resolve();
        }
      };
      for (const client of wss.clients) {
        client.once("close", check);
      }
    });
  }

  const closeWithTimeout = (fn: (cb: (err?: Error) => void) => void, label: string) =>
    new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        logger.warn("shutdown_timeout", { label });
        reject(new Error(`${label} close timeout`));
      }, SHUTDOWN_TIMEOUT_MS);
      fn(() => {
        clearTimeout(timer);
        resolve();
      });
    });

  return {
    async start() {
      if (running) return;
      if (stopped) {
        throw new Error("server was stopped; create a new instance");
      }
      try {
        await new Promise<void>((resolve, reject) => {
          const onError = (err: Error) => {
            httpServer.off("listening", onListening);
            reject(err);
          };
          const onListening = () => {
            httpServer.off("error", onError);
            resolve();
          };
          httpServer.once("error", onError);
          httpServer.once("listening", onListening);
          httpServer.listen(config.port, config.network.bindAddress);
        });
      } catch (err) {
        logger.error("server_start_failed", {
          port: config.port,
          bindAddress: config.network.bindAddress,
          error: describeError(err),
        });
        stopped = true;
        stopEngines();
        wss.close();
        throw err;
      }
      running = true;
      logger.info("server_listening", {
        bindAddress: config.network.bindAddress,
        port: readBoundPort(),
      });
    },
    async stop() {
      if (!running) return;
      running = false;
      stopped = true;
      for (const connection of registry.allConnections()) {
        connection.close(CloseCode.SERVER_STOPPED, SERVER_STOPPED_REASON);
        registry.detach(connection);
      }
      stopEngines();
      await queue.drain();
      await waitForClients(CLIENT_CLOSE_GRACE_MS);
      httpServer.closeAllConnections();
      await closeWithTimeout((cb) => wss.close(cb), "wss");
      await closeWithTimeout((cb) => httpServer.close(cb), "httpServer");
      logger.info("server_stopped");
    },
    isRunning: () => running,
    getPort: readBoundPort,
    getConnectionCount: () => registry.size(),
    listConnections,
    closeConnection(id) {
      const connection = registry.findConnection(id);
      if (!connection) {
        return false;
      }
      connection.close(CloseCode.CLOSED_BY_HOST_USER, CLOSED_BY_HOST_REASON);
      registry.detach(connection);
      return true;
    },
    publishTouch: (event) => touchStream.publish(event),
  };
}
