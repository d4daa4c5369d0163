import { parseArguments } from "./commands/parser.ts";
import type { CommandContext, CommandResult, ParameterDefinition } from "./commands/types.ts";
import type { ParsedArguments } from "./commands/parser.ts";

/**
 * Service health status
 */
export enum ServiceStatus {
  INITIALIZING = "initializing",
  RUNNING = "running",
  DEGRADED = "degraded",
  ERROR = "error",
  STOPPED = "stopped"
}

/**
 * Service state management
 */
export interface ServiceState {
  status: ServiceStatus;
  health: {
    lastCheck: Date;
    errors: string[];
  };
}

/**
 * Service version information
 */
export interface ServiceVersion {
  major: number;
  minor: number;
  patch: number;
}

/**
 * Interface for service configuration
 */
export interface ServiceConfig {
  name: string;
  version: ServiceVersion;
  commands: ServiceCommand[];
  init?: () => Promise<void>;
  healthCheck?: () => Promise<boolean>;
  cleanup?: () => Promise<void>;
}

/**
 * Interface for service command definition
 */
export interface ServiceCommand {
  name: string;
  description: string;
  parameters?: ParameterDefinition[];
  action: (args: ParsedArguments, context: CommandContext) => void | Promise<void>;
}

/**
 * Service registry: owns registered services, their state, and dispatches
 * `<service> <command>` invocations to them.
 */
export class ServiceRegistry {
  private services = new Map<string, ServiceConfig>();
  private states = new Map<string, ServiceState>();

  /**
   * Register a new service and run its init hook
   * @param config Service configuration
   */
  async registerService(config: ServiceConfig): Promise<void> {
    if (this.services.has(config.name)) {
      throw new Error(`Service ${config.name} is already registered`);
    }

    this.states.set(config.name, {
      status: ServiceStatus.INITIALIZING,
      health: { lastCheck: new Date(), errors: [] },
    });

    if (config.init) {
      try {
        await config.init();
      } catch (error) {
        this.updateServiceStatus(config.name, ServiceStatus.ERROR, error instanceof Error ? error.message : String(error));
        throw error;
      }
    }
    this.updateServiceStatus(config.name, ServiceStatus.RUNNING);
    this.services.set(config.name, config);
  }

  /**
   * Update service status and health information
   */
  private updateServiceStatus(name: string, status: ServiceStatus, error?: string): void {
    const state = this.states.get(name);
    if (state) {
      state.status = status;
      if (error) {
        state.health.errors.push(error);
      }
      state.health.lastCheck = new Date();
    }
  }

  getServiceState(name: string): ServiceState | undefined {
    return this.states.get(name);
  }

  /**
   * Run health check for a service
   * @param name Service name
   */
  async checkServiceHealth(name: string): Promise<boolean> {
    const service = this.services.get(name);
    if (!service?.healthCheck) {
      return false;
    }

    try {
      const healthy = await service.healthCheck();
      this.updateServiceStatus(name, healthy ? ServiceStatus.RUNNING : ServiceStatus.DEGRADED);
      return healthy;
    } catch (error) {
      const errorMessage = error instanceof Error
        ? error.message
        : 'Unknown error during health check';
      this.updateServiceStatus(name, ServiceStatus.ERROR, errorMessage);
      return false;
    }
  }

  /**
   * Parse arguments for a service command and run it.
   *
   * Parse errors and thrown errors are reported in the result, not thrown.
   */
  async execute(serviceName: string, commandName: string, rawArgs: string[], context: CommandContext): Promise<CommandResult> {
    const service = this.services.get(serviceName);
    if (!service) {
      return { success: false, error: new Error(`Unknown service: ${serviceName}`) };
    }
    const command = service.commands.find((cmd) => cmd.name === commandName);
    if (!command) {
      return { success: false, error: new Error(`Unknown command: ${serviceName} ${commandName}`) };
    }

    const args = parseArguments(rawArgs, command.parameters);
    if (args.helpRequested) {
      context.write(formatHelp(serviceName, command));
      return { success: true };
    }
    if (args.errors.length > 0) {
      return { success: false, error: new Error(args.errors.join("\n")) };
    }

    try {
      await command.action(args, context);
      return { success: true };
    } catch (error) {
      return { success: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  /**
   * Unregister a service and cleanup
   * @param name Service name
   */
  async unregisterService(name: string): Promise<void> {
    this.updateServiceStatus(name, ServiceStatus.STOPPED);
    const service = this.services.get(name);
    if (service?.cleanup) {
      await service.cleanup();
    }
    this.services.delete(name);
    this.states.delete(name);
  }

  /**
   * Unregister every service, most recently registered first.
   */
  async unregisterAll(): Promise<void> {
    for (const name of [...this.services.keys()].reverse()) {
      await this.unregisterService(name);
    }
  }

  getServices(): Map<string, ServiceConfig> {
    return this.services;
  }
}

/**
 * Usage text for one command.
 */
export function formatHelp(serviceName: string, command: ServiceCommand): string {
  const lines = [`${serviceName} ${command.name} - ${command.description}`];
  for (const param of command.parameters ?? []) {
    const alias = param.alias ? `-${param.alias}, ` : "";
    const value = param.isFlag ? "" : ` <${param.type}>`;
    const required = param.required ? " (required)" : "";
    lines.push(`  ${alias}--${param.name}${value}  ${param.description}${required}`);
  }
  return lines.join("\n");
}
