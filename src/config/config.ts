import fs from "node:fs/promises";

import { ConfigError, describeError } from "../sensorcast/errors.js";
import type { SensorcastConfig } from "./types.sensorcast.js";
import { SensorcastSchema } from "./zod-schema.sensorcast.js";

export type { SensorcastConfig } from "./types.sensorcast.js";

export function parseConfig(raw: unknown, source = "config"): SensorcastConfig {
  const result = SensorcastSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const issuePath = issue && issue.path.length > 0 ? issue.path.join(".") : "<root>";
    throw new ConfigError(issuePath, `${source}: ${issuePath}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/** Reads a JSON config file. A missing file yields an empty config. */
export async function loadConfig(filePath: string): Promise<SensorcastConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("<root>", `${filePath}: invalid JSON (${describeError(err)})`);
  }
  return parseConfig(raw, filePath);
}
