/**
 * Debug Channels
 *
 * Targeted debug output for following what the scanner and generator see
 * and decide. Enable via environment variable:
 *
 * ```bash
 * GDNATIVE_DEBUG=scan cargo build        # Just the declaration scan
 * GDNATIVE_DEBUG=walk,generate npm test  # Multiple channels
 * GDNATIVE_DEBUG=* npm test              # Everything
 * ```
 *
 * Channels are always present in code and are no-ops when disabled:
 * ```typescript
 * debug.scan("file.done", { path, classes: 2 });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.error, keeping stdout clean for build tools) */
  output: (message: string) => void;
}

export const DEBUG_ENV_VAR = "GDNATIVE_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

/** Format a debug message */
export function formatDebugMessage(channel: string, point: string, data?: DebugData): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 80) return `"${value.slice(0, 77)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/**
 * Re-read GDNATIVE_DEBUG and recreate every channel.
 * Call this if the variable changes at runtime.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.walk = createChannel("walk");
  debug.parse = createChannel("parse");
  debug.scan = createChannel("scan");
  debug.generate = createChannel("generate");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Reset output configuration to defaults (format, timestamps, output). */
export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

/**
 * Check if a debug channel (or any channel, when omitted) is enabled.
 * Useful for skipping expensive data collection.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Source tree walking and ignore-file handling */
  walk: createChannel("walk"),

  /** Rust lexing and item parsing */
  parse: createChannel("parse"),

  /** NativeClass discovery */
  scan: createChannel("scan"),

  /** Path layout and resource writing */
  generate: createChannel("generate"),
};

export type Debug = typeof debug;
