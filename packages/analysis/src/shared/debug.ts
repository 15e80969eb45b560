/**
 * Debug Channels
 *
 * Targeted, structured debug output for following what the engine decides:
 * which units run, which imports resolve, which specializations apply.
 *
 * Enable via environment variable:
 * ```bash
 * PYSCOPE_DEBUG=scheduler npm test          # one channel
 * PYSCOPE_DEBUG=imports,specialize npm test # several
 * PYSCOPE_DEBUG=* npm test                  # everything
 * ```
 *
 * Channels are always present in code and cost a no-op call when disabled:
 * ```typescript
 * debug.imports("resolve.miss", { name });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Sink for formatted messages (defaults to console.log) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

export const DEBUG_ENV_VAR = "PYSCOPE_DEBUG";

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
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
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  if (parts.length === 0) return "{}";
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("name" in value && typeof value.name === "string") return `<${value.name}>`;
    if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Re-read PYSCOPE_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.scheduler = createChannel("scheduler");
  debug.modules = createChannel("modules");
  debug.imports = createChannel("imports");
  debug.specialize = createChannel("specialize");
  debug.values = createChannel("values");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Worklist processing (unit pops, cancellation, truncation) */
  scheduler: createChannel("scheduler"),

  /** Module registry (add/remove/reload) */
  modules: createChannel("modules"),

  /** Import resolution */
  imports: createChannel("imports"),

  /** Specialization registration and replay */
  specialize: createChannel("specialize"),

  /** Host object classification */
  values: createChannel("values"),
};

export type Debug = typeof debug;
