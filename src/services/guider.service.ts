import type { SettleParams } from "../config.ts";
import { errorMessage, ReconnectFailedError } from "../errors.ts";
import type { GuiderClient } from "../remote/client.ts";
import { GuiderOperations } from "../remote/operations.ts";
import { type GuiderEvent, GuiderEventType, type RpcParams } from "../remote/protocol.ts";
import type { ServiceCommand, ServiceConfig } from "../services.ts";

/**
 * One-line rendering of an event for terminal output.
 */
export function formatEvent(event: GuiderEvent): string {
  switch (event.Event) {
    case GuiderEventType.UNRECOGNIZED:
      return `${event.name} ${JSON.stringify(event.payload)}`;
    case GuiderEventType.CONNECTION_LOST:
    case GuiderEventType.RECONNECT_FAILED:
      return `${event.Event}: ${event.reason}`;
    case GuiderEventType.RECONNECTING:
      return `${event.Event}: attempt ${event.attempt}${event.maxAttempts === undefined ? "" : `/${event.maxAttempts}`}`;
    default: {
      const { Event: name, ...fields } = event;
      return Object.keys(fields).length > 0 ? `${name} ${JSON.stringify(fields)}` : name;
    }
  }
}

/**
 * Parses the `--params` option of the `call` command.
 */
export function parseParams(raw: string | undefined): RpcParams | undefined {
  if (raw === undefined) {
    return undefined;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new Error(`--params is not valid JSON: ${errorMessage(error)}`);
  }
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value));
  }
  throw new Error("--params must be a JSON object or array");
}

export interface GuiderServiceOptions {
  /** Settling used by `guide` and `dither` */
  settle: SettleParams;
  /** Connect the profile's equipment right after the session opens */
  autoConnectEquipment?: boolean;
}

/**
 * Guider Session Service
 * Exposes the session client as CLI commands
 */
export class GuiderService {
  private readonly operations: GuiderOperations;
  private commands: ServiceCommand[];

  constructor(private readonly client: GuiderClient, private readonly options: GuiderServiceOptions) {
    this.operations = new GuiderOperations(client);
    this.commands = [
      {
        name: "status",
        description: "Show connection, version and application state",
        action: async (_args, context) => {
          await this.ensureConnected();
          const state = await this.operations.getAppState();
          context.write(`connected: ${this.client.isConnected()}`);
          context.write(`version: ${this.client.getVersion() ?? "unknown"}`);
          context.write(`state: ${state}`);
        },
      },
      {
        name: "monitor",
        description: "Print events as they arrive",
        parameters: [
          { name: "count", alias: "n", type: "number", description: "Stop after this many events" },
        ],
        action: async (args, context) => {
          const count = typeof args.options.count === "number" ? args.options.count : Infinity;
          const subscription = this.client.subscribe();
          await this.ensureConnected();
          let seen = 0;
          for await (const event of subscription) {
            context.write(formatEvent(event));
            if (event.Event === GuiderEventType.RECONNECT_FAILED) {
              throw new ReconnectFailedError(event.reason);
            }
            seen++;
            if (seen >= count) {
              break;
            }
          }
        },
      },
      {
        name: "guide",
        description: "Start guiding; completion is reported by a SettleDone event",
        parameters: [
          { name: "recalibrate", alias: "r", type: "boolean", isFlag: true, description: "Calibrate before guiding" },
        ],
        action: async (args, context) => {
          await this.ensureConnected();
          await this.operations.guide(this.options.settle, args.options.recalibrate === true);
          context.write("Guiding requested");
        },
      },
      {
        name: "dither",
        description: "Shift the lock position by a random amount",
        parameters: [
          { name: "amount", alias: "a", type: "number", required: true, description: "Maximum shift in pixels" },
          { name: "ra-only", type: "boolean", isFlag: true, description: "Dither in right ascension only" },
        ],
        action: async (args, context) => {
          const amount = args.options.amount;
          if (typeof amount !== "number") {
            throw new Error("--amount must be a number");
          }
          await this.ensureConnected();
          await this.operations.dither(amount, args.options["ra-only"] === true, this.options.settle);
          context.write("Dither requested");
        },
      },
      {
        name: "pause",
        description: "Pause guiding",
        parameters: [
          { name: "full", alias: "f", type: "boolean", isFlag: true, description: "Also stop looping exposures" },
        ],
        action: async (args, context) => {
          await this.ensureConnected();
          await this.operations.pause(args.options.full === true);
          context.write("Paused");
        },
      },
      {
        name: "resume",
        description: "Resume guiding",
        action: async (_args, context) => {
          await this.ensureConnected();
          await this.operations.resume();
          context.write("Resumed");
        },
      },
      {
        name: "stop-capture",
        description: "Stop looping and guiding",
        action: async (_args, context) => {
          await this.ensureConnected();
          await this.operations.stopCapture();
          context.write("Capture stopped");
        },
      },
      {
        name: "call",
        description: "Call a remote method and print its JSON result",
        parameters: [
          { name: "params", alias: "p", type: "string", description: "JSON object or array of parameters" },
          { name: "timeout", alias: "t", type: "number", description: "Call timeout in milliseconds" },
        ],
        action: async (args, context) => {
          const [method] = args.positional;
          if (!method) {
            throw new Error("Usage: guider call <method> [--params JSON]");
          }
          const raw = args.options.params;
          const timeout = args.options.timeout;
          await this.ensureConnected();
          const result = await this.client.call(
            method,
            parseParams(typeof raw === "string" ? raw : undefined),
            typeof timeout === "number" ? timeout : undefined,
          );
          context.write(JSON.stringify(result, null, 2));
        },
      },
    ];
  }

  /**
   * Get service configuration
   */
  getConfig(): ServiceConfig {
    return {
      name: "guider",
      version: { major: 1, minor: 0, patch: 0 },
      commands: this.commands,
      healthCheck: async () => this.client.isConnected(),
      cleanup: () => this.client.disconnect(),
    };
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isConnected()) {
      return;
    }
    await this.client.connect();
    if (this.options.autoConnectEquipment) {
      console.log("[GuiderService.ensureConnected] Connecting equipment");
      await this.operations.setConnected(true);
    }
  }
}
