import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const SensorcastSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(0).max(65_535).optional(),
    network: z
      .object({
        bindAddress: z.string().min(1).optional(),
        allowPublic: z.boolean().optional(),
      })
      .strict()
      .optional(),
    sensors: z
      .object({
        samplingPeriodUs: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    scans: z
      .object({
        intervalMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    location: z
      .object({
        pollIntervalMs: z.number().int().positive().optional(),
        maxAccuracyMeters: z.number().positive().nullable().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
