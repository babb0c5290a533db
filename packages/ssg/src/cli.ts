import { relative } from "node:path";
import { formatDiagnostic, refreshDebugChannels } from "@sssg/shared";
import { build, type BuildCollaborators } from "./build.js";
import { ConfigError, loadConfigFile, resolveConfig, type ConfigOverrides } from "./config.js";
import { isSiteError } from "./errors.js";

export const EXIT_OK = 0;
export const EXIT_BUILD_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliFlags {
  help: boolean;
  root: string | undefined;
  config: string | undefined;
  overrides: ConfigOverrides;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  cwd: string;
}

const VALUE_FLAGS = new Set(["--root", "--src", "--dst", "--config", "--concurrency"]);

export const USAGE = `
sssg - build a static site from a directory of Markdown posts

Usage:
  sssg [options]

Options:
  --root <dir>         Project root; other paths resolve against it (default: cwd)
  --src <dir>          Content directory (default: posts)
  --dst <dir>          Output directory, replaced on success (default: _site)
  --config <file>      Config file (default: sssg.config.json in the root, if present)
  --drafts             Include documents with draft = "true"
  --concurrency <n>    Documents rendered at once (default: 4)
  --help, -h           Show this help message

Environment:
  SSSG_DEBUG=<channels>  Debug output: config,load,model,render,emit,build or *
  SSSG_DEBUG_FORMAT=json Debug output as one JSON object per line

Exit codes:
  0  Site built
  1  Build failed (every problem found is listed)
  2  Invalid arguments or configuration
`;

/**
 * Parse command-line arguments. Accepts `--flag value` and `--flag=value`.
 *
 * @throws ConfigError on unknown flags or missing values
 */
export function parseCliArgs(args: readonly string[]): CliFlags {
  const flags: CliFlags = { help: false, root: undefined, config: undefined, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      flags.help = true;
      continue;
    }
    if (arg === "--drafts") {
      flags.overrides.includeDrafts = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!VALUE_FLAGS.has(name)) {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw new ConfigError(`${name} needs a value`);
    }

    switch (name) {
      case "--root":
        flags.root = value;
        break;
      case "--src":
        flags.overrides.contentDir = value;
        break;
      case "--dst":
        flags.overrides.outDir = value;
        break;
      case "--config":
        flags.config = value;
        break;
      case "--concurrency": {
        const n = Number(value);
        if (!Number.isInteger(n) || n < 1) {
          throw new ConfigError(`--concurrency must be a positive integer, got ${value}`);
        }
        flags.overrides.concurrency = n;
        break;
      }
    }
  }
  return flags;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function run(
  args: readonly string[],
  io: CliIO = defaultIO(),
  collaborators: BuildCollaborators = {},
): Promise<number> {
  refreshDebugChannels();

  let flags: CliFlags;
  try {
    flags = parseCliArgs(args);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  if (flags.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const root = flags.root ?? io.cwd;
  try {
    const file = await loadConfigFile(root, flags.config);
    const config = resolveConfig(root, file, flags.overrides);
    const result = await build(config, collaborators);

    for (const d of result.diagnostics) {
      io.stderr(formatDiagnostic(d));
    }
    const where = relative(io.cwd, result.outDir) || ".";
    io.stdout(`Built ${result.pages.length} pages and copied ${result.assets.length} assets into ${where}`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(error.message);
      return EXIT_USAGE;
    }
    if (isSiteError(error)) {
      for (const d of error.diagnostics) {
        io.stderr(formatDiagnostic(d));
      }
      const errors = error.diagnostics.filter((d) => d.severity === "error").length;
      io.stderr(`${error.kind}: build failed with ${errors} ${errors === 1 ? "error" : "errors"}; nothing was written`);
      return EXIT_BUILD_FAILED;
    }
    io.stderr(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    return EXIT_BUILD_FAILED;
  }
}

function defaultIO(): CliIO {
  return {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    cwd: process.cwd(),
  };
}
