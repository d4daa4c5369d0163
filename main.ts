/**
 * Command line entry point.
 *
 *   main.ts [--config PATH] [--host HOST] [--port PORT] <service> <command> [options]
 *
 * Services: `guider` (status, monitor, call, guide, dither, pause, resume,
 * stop-capture) and `process` (start, stop, running).
 * @module
 */

import { pathToFileURL } from "node:url";

import { parseArguments } from "./src/commands/parser.ts";
import type { CommandContext, ParameterDefinition } from "./src/commands/types.ts";
import { defaultConfig, type GuiderConfig, loadConfig, validateConfig } from "./src/config.ts";
import { errorMessage } from "./src/errors.ts";
import { GuiderClient } from "./src/remote/client.ts";
import { ServiceRegistry } from "./src/services.ts";
import { GuiderService } from "./src/services/guider.service.ts";
import { ProcessService } from "./src/services/process.service.ts";

const GLOBAL_PARAMETERS: ParameterDefinition[] = [
  { name: "config", alias: "c", type: "string", description: "JSON configuration file" },
  { name: "host", type: "string", description: "Guider host (overrides the configuration)" },
  { name: "port", type: "number", description: "Guider port (overrides the configuration)" },
];

const USAGE = [
  "Usage: main.ts [--config PATH] [--host HOST] [--port PORT] <service> <command> [options]",
  "",
  "  guider status                 connect and show version and application state",
  "  guider monitor [--count N]    print events as they arrive",
  "  guider call <method> [--params JSON] [--timeout MS]",
  "  guider guide [--recalibrate]  start guiding with the configured settling",
  "  guider dither --amount PX [--ra-only]",
  "  guider pause [--full] | resume | stop-capture",
  "  process start [--executable PATH]",
  "  process stop",
  "  process running",
].join("\n");

/**
 * Splits leading global options from `<service> <command> [options]`.
 */
export function splitGlobalArgs(argv: string[]): { globals: string[]; rest: string[] } {
  let i = 0;
  while (i < argv.length && argv[i].startsWith("-")) {
    const arg = argv[i];
    const takesValue = arg.startsWith("--") ? !arg.includes("=") && arg !== "--help" : true;
    i += takesValue ? 2 : 1;
  }
  return { globals: argv.slice(0, i), rest: argv.slice(i) };
}

async function resolveConfig(options: Record<string, string | number | boolean>): Promise<GuiderConfig> {
  const base = typeof options.config === "string" ? await loadConfig(options.config) : defaultConfig();
  return validateConfig({
    ...base,
    ...(typeof options.host === "string" ? { host: options.host } : {}),
    ...(typeof options.port === "number" ? { port: options.port } : {}),
  });
}

/**
 * Runs one CLI invocation.
 *
 * @returns The process exit code.
 */
export async function run(argv: string[], context: CommandContext = { write: (line) => console.log(line) }): Promise<number> {
  const { globals, rest } = splitGlobalArgs(argv);
  const parsed = parseArguments(globals, GLOBAL_PARAMETERS);
  const [serviceName, commandName, ...commandArgs] = rest;
  if (parsed.helpRequested || !serviceName || !commandName) {
    context.write(USAGE);
    return parsed.helpRequested ? 0 : 1;
  }
  if (parsed.errors.length > 0) {
    context.write(parsed.errors.join("\n"));
    return 1;
  }

  let config: GuiderConfig;
  try {
    config = await resolveConfig(parsed.options);
  } catch (error) {
    context.write(errorMessage(error));
    return 1;
  }

  const client = new GuiderClient({
    host: config.host,
    port: config.port,
    connectionTimeoutMs: config.connectionTimeoutMs,
    commandTimeoutMs: config.commandTimeoutMs,
    reconnect: config.reconnect,
  });
  const processService = new ProcessService(config, { client });
  const registry = new ServiceRegistry();

  try {
    await registry.registerService(processService.getConfig());
    await registry.registerService(
      new GuiderService(client, { settle: config.settle, autoConnectEquipment: config.autoConnectEquipment }).getConfig(),
    );

    if (config.autoStart && serviceName === "guider") {
      await processService.start();
    }

    const result = await registry.execute(serviceName, commandName, commandArgs, context);
    if (!result.success) {
      context.write(`Error: ${result.error?.message ?? "command failed"}`);
      return 1;
    }
    return 0;
  } catch (error) {
    context.write(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    await registry.unregisterAll();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("[main] Unhandled error:", error);
      process.exit(1);
    },
  );
}
