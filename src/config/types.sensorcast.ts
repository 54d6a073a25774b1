export type SensorcastLogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type SensorcastConfig = {
  /** Defaults to true; `false` keeps the service from starting. */
  enabled?: boolean;
  port?: number;
  network?: {
    bindAddress?: string;
    /** Required to bind anything but a loopback address. */
    allowPublic?: boolean;
  };
  sensors?: {
    /** Sampling period handed to the sensor source, in microseconds. */
    samplingPeriodUs?: number;
  };
  scans?: {
    intervalMs?: number;
  };
  location?: {
    pollIntervalMs?: number;
    maxAccuracyMeters?: number | null;
  };
  logging?: {
    level?: SensorcastLogLevel;
  };
};
