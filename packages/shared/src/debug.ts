/**
 * Debug Channels
 *
 * Targeted debug logging for following what the build pipeline reads, decides
 * and writes. Each pipeline stage logs to its own channel, on stderr so stdout
 * stays free for results.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * SSSG_DEBUG=load npm run site          # Just content discovery
 * SSSG_DEBUG=model,render npm run site  # Multiple channels
 * SSSG_DEBUG=* npm run site             # Everything
 * SSSG_DEBUG=* SSSG_DEBUG_FORMAT=json npm run site
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.load("file.content", { path, identifier });
 * debug.emit("asset.copy", { from, to });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export type DebugFormat = "json" | "pretty";

export const DEBUG_ENV = "SSSG_DEBUG";
export const DEBUG_FORMAT_ENV = "SSSG_DEBUG_FORMAT";

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

function parseFormatEnv(): DebugFormat {
  return process.env[DEBUG_FORMAT_ENV]?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

/** Enabled channels and format (read once at module load, can be refreshed) */
let enabledChannels = parseDebugEnv();
let format = parseFormatEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
  style: DebugFormat = format,
): string {
  if (style === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return label;
  }
  return `${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    // Truncate long strings
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) {
      const inline = `[${value.map(formatValue).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  // Channels are rebuilt by refreshDebugChannels(), so the check happens once here
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    console.error(formatMessage(name, point, data));
  };
}

/**
 * Re-read SSSG_DEBUG and SSSG_DEBUG_FORMAT and rebuild every channel.
 * The CLI calls this on start so the variables apply per run.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  format = parseFormatEnv();
  debug.config = createChannel("config");
  debug.load = createChannel("load");
  debug.model = createChannel("model");
  debug.render = createChannel("render");
  debug.emit = createChannel("emit");
  debug.build = createChannel("build");
}

/**
 * Debug channels for each pipeline stage.
 */
export const debug = {
  /** Configuration file and CLI option resolution */
  config: createChannel("config"),

  /** Content discovery and front-matter parsing */
  load: createChannel("load"),

  /** Document validation and site assembly */
  model: createChannel("model"),

  /** Markdown and template rendering */
  render: createChannel("render"),

  /** Output staging, writes and asset copies */
  emit: createChannel("emit"),

  /** Overall build lifecycle */
  build: createChannel("build"),
};

export type Debug = typeof debug;
