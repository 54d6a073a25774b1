// WebSocket close codes 4000-4999 are reserved for applications.
export const CloseCode = {
  CAPABILITY_NOT_FOUND: 4001,
  UNSUPPORTED_REQUEST: 4002,
  PARAMETER_MISSING: 4003,
  SERVER_STOPPED: 4004,
  CLOSED_BY_HOST_USER: 4005,
  INVALID_ARRAY: 4006,
  TOO_FEW_CAPABILITIES: 4007,
  NO_CAPABILITY_SPECIFIED: 4008,
  PERMISSION_DENIED: 4009,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

/** RFC 6455 caps the close frame payload at 125 bytes, two of which carry the code. */
export const MAX_CLOSE_REASON_BYTES = 123;

export function truncateUtf8(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) {
    return value;
  }
  let bytes = 0;
  let result = "";
  for (const char of value) {
    const charBytes = Buffer.byteLength(char, "utf8");
    if (bytes + charBytes > maxBytes) {
      break;
    }
    result += char;
    bytes += charBytes;
  }
  return result;
}

export function truncateCloseReason(reason: string): string {
  return truncateUtf8(reason, MAX_CLOSE_REASON_BYTES);
}

export class ConnectionRejectedError extends Error {
  constructor(
    public code: CloseCode,
    reason: string,
  ) {
    super(truncateCloseReason(reason));
    this.name = "ConnectionRejectedError";
  }
}

export class ConfigError extends Error {
  constructor(
    public path: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
