import { loadConfig } from "../config/load";
import { errorMessage, isConfigError, isUsageError, UsageError } from "../errors";
import { debug } from "../logging";
import { isOutputFormat, OUTPUT_FORMATS } from "../output/format";
import { CONNECTION_KINDS, DEFAULT_CONNECTION_KIND, isConnectionKind } from "../process/connections";
import type { TunnelSelection } from "../tunnels/select";
import { runStartCommand } from "./commands/start";
import { runStatusCommand } from "./commands/status";
import { runStopCommand } from "./commands/stop";
import { CLI_NAME, CLI_VERSION } from "./config/app";
import { DEFAULT_STATUS_FORMAT } from "./config/status";
import { CLI_USAGE_TEXT } from "./config/usage";
import type {
  CliDeps,
  GlobalOptions,
  StartCommandOptions,
  StatusCommandOptions,
  StopCommandOptions,
} from "./types";

const HELP_FLAGS = new Set(["--help", "-h"]);

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

// Split argv into global options, the command name and its own arguments.
export function parseGlobalOptions(argv: string[]): {
  options: GlobalOptions;
  command?: string;
  rest: string[];
} {
  const options: GlobalOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--config":
      case "-c":
        options.configPath = takeValue(argv, i, arg);
        i++;
        continue;
      case "--version":
      case "-v":
        options.version = true;
        continue;
      case "--help":
      case "-h":
        options.help = true;
        continue;
    }

    if (arg === undefined || arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    return { options, command: arg, rest: argv.slice(i + 1) };
  }

  return { options, rest: [] };
}

function parseSelection(
  command: string,
  args: string[],
  extra: (arg: string) => boolean = () => false,
): TunnelSelection {
  const names: string[] = [];
  const selection: TunnelSelection = { names };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--name" || arg === "-n") {
      names.push(takeValue(args, i, arg));
      i++;
      continue;
    }

    if (arg === "--group" || arg === "-g") {
      selection.group = takeValue(args, i, arg);
      i++;
      continue;
    }

    if (arg === "--all" || arg === "-a") {
      selection.all = true;
      continue;
    }

    if (extra(arg)) continue;

    throw new UsageError(`Unknown option for ${command}: ${arg}`);
  }

  return selection;
}

export function parseStartOptions(args: string[]): StartCommandOptions {
  let useAutossh = true;
  const selection = parseSelection("start", args, (arg) => {
    if (arg !== "--no-autossh") return false;
    useAutossh = false;
    return true;
  });
  return { selection, useAutossh };
}

export function parseStopOptions(args: string[]): StopCommandOptions {
  return { selection: parseSelection("stop", args) };
}

export function parseStatusOptions(args: string[]): StatusCommandOptions {
  const options: StatusCommandOptions = {
    live: false,
    format: DEFAULT_STATUS_FORMAT,
    columns: [],
    kind: DEFAULT_CONNECTION_KIND,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    switch (arg) {
      case "--live":
      case "-l":
        options.live = true;
        break;

      case "--format":
      case "-f": {
        const value = takeValue(args, i, arg).toLowerCase();
        if (!isOutputFormat(value)) {
          throw new UsageError(
            `Invalid format: ${value}. Must be one of: ${OUTPUT_FORMATS.join(", ")}`,
          );
        }
        options.format = value;
        i++;
        break;
      }

      case "--column":
        options.columns.push(takeValue(args, i, arg));
        i++;
        break;

      case "--kind": {
        const value = takeValue(args, i, arg).toLowerCase();
        if (!isConnectionKind(value)) {
          throw new UsageError(
            `Invalid kind: ${value}. Must be one of: ${CONNECTION_KINDS.join(", ")}`,
          );
        }
        options.kind = value;
        i++;
        break;
      }

      default:
        throw new UsageError(`Unknown option for status: ${arg}`);
    }
  }

  return options;
}

async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  const write = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const { options, command, rest } = parseGlobalOptions(argv);

  if (options.version) {
    write(`${CLI_NAME} ${CLI_VERSION}\n`);
    return 0;
  }

  if (options.help || !command || rest.some((arg) => HELP_FLAGS.has(arg))) {
    write(CLI_USAGE_TEXT);
    return 0;
  }

  const load = deps.loadConfig ?? ((explicitPath?: string) => loadConfig(explicitPath));

  switch (command) {
    case "start": {
      const startOptions = parseStartOptions(rest);
      await runStartCommand(load(options.configPath), startOptions, deps);
      return 0;
    }

    case "stop": {
      const stopOptions = parseStopOptions(rest);
      await runStopCommand(load(options.configPath), stopOptions, deps);
      return 0;
    }

    case "status": {
      const statusOptions = parseStatusOptions(rest);
      await runStatusCommand(load(options.configPath), statusOptions, deps);
      return 0;
    }

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

// Main CLI dispatcher. Resolves to the process exit code.
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const writeErr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    return await dispatch(argv, deps);
  } catch (err) {
    if (!isUsageError(err) && !isConfigError(err) && err instanceof Error) {
      debug(err.stack ?? err.message);
    }
    writeErr(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}
