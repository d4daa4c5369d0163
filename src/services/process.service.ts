import { type ChildProcess, spawn } from "node:child_process";
import { existsSync } from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

import type { GuiderConfig } from "../config.ts";
import {
  errorMessage,
  ExecutableNotFoundError,
  isGuiderError,
  ProcessAlreadyRunningError,
  ProcessStartFailedError,
  TimeoutError,
} from "../errors.ts";
import type { GuiderSession } from "../remote/client.ts";
import { type ConnectionFactory, TcpConnectionFactory } from "../remote/transport.ts";
import type { ServiceCommand, ServiceConfig } from "../services.ts";

/**
 * A spawned guider process.
 */
export interface ProcessHandle {
  readonly pid?: number;
  hasExited(): boolean;
  /** Exit code or terminating signal, once exited */
  readonly exitStatus?: number | string;
  /** Resolves `true` if the process exited within the timeout. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  /** Forcefully terminates the process and waits for it to exit. */
  kill(): Promise<void>;
}

/**
 * Starts guider processes.
 */
export interface ProcessSpawner {
  /**
   * Spawns the executable with `env` added to the current environment.
   * @throws {ProcessStartFailedError} If the process cannot be spawned.
   */
  spawn(executable: string, env: Record<string, string>): Promise<ProcessHandle>;
}

class ChildProcessHandle implements ProcessHandle {
  private exited = false;
  private status?: number | string;
  private readonly exitPromise: Promise<void>;

  constructor(private readonly child: ChildProcess) {
    this.exitPromise = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.exited = true;
        this.status = code ?? signal ?? undefined;
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exitStatus(): number | string | undefined {
    return this.status;
  }

  hasExited(): boolean {
    return this.exited;
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) {
      return true;
    }
    const controller = new AbortController();
    const timedOut = sleep(timeoutMs, false, { signal: controller.signal }).catch(() => false);
    const exited = await Promise.race([this.exitPromise.then(() => true), timedOut]);
    controller.abort();
    return exited;
  }

  async kill(): Promise<void> {
    if (!this.exited) {
      this.child.kill("SIGKILL");
      await this.exitPromise;
    }
  }
}

/**
 * Spawns processes with `node:child_process`, stdio detached from ours.
 */
export class ChildProcessSpawner implements ProcessSpawner {
  spawn(executable: string, env: Record<string, string>): Promise<ProcessHandle> {
    return new Promise((resolve, reject) => {
      const child = spawn(executable, [], {
        env: { ...process.env, ...env },
        stdio: "ignore",
      });
      const onError = (error: Error): void => {
        reject(new ProcessStartFailedError(error.message, { path: executable }, error));
      };
      child.once("error", onError);
      child.once("spawn", () => {
        child.off("error", onError);
        child.on("error", (error) => console.error(`[ChildProcessSpawner] ${executable}: ${error.message}`));
        // The guider may outlive this process; do not hold the event loop open for it.
        child.unref();
        resolve(new ChildProcessHandle(child));
      });
    });
  }
}

/**
 * Inputs for executable discovery; all default to the current host.
 */
export interface ExecutableSearchOptions {
  platform?: NodeJS.Platform;
  /** Value of the PATH variable */
  pathEnv?: string;
  exists?: (file: string) => boolean;
}

/**
 * Well-known install locations of the guiding application per platform.
 */
export function defaultExecutableCandidates(platform: NodeJS.Platform, pathEnv = ""): string[] {
  switch (platform) {
    case "darwin":
      return ["/Applications/PHD2.app/Contents/MacOS/PHD2"];
    case "win32":
      return [
        "C:\\Program Files (x86)\\PHDGuiding2\\phd2.exe",
        "C:\\Program Files\\PHDGuiding2\\phd2.exe",
      ];
    case "linux":
      return [
        "/usr/bin/phd2",
        "/usr/local/bin/phd2",
        ...pathEnv.split(path.posix.delimiter).filter((dir) => dir.length > 0).map((dir) => path.posix.join(dir, "phd2")),
      ];
    default:
      return [];
  }
}

/**
 * First existing default location, if any.
 */
export function findDefaultExecutable(options: ExecutableSearchOptions = {}): string | undefined {
  const platform = options.platform ?? process.platform;
  const exists = options.exists ?? existsSync;
  const candidates = defaultExecutableCandidates(platform, options.pathEnv ?? process.env.PATH ?? "");
  return candidates.find((candidate) => exists(candidate));
}

export interface ProcessServiceOptions {
  spawner?: ProcessSpawner;
  connectionFactory?: ConnectionFactory;
  search?: ExecutableSearchOptions;
  /** Client used for graceful shutdown when `stop()` is not given one */
  client?: GuiderSession;
  /** Wait for exit after the shutdown call, in milliseconds (defaults to 10000) */
  shutdownTimeoutMs?: number;
  /** Reachability polling interval, in milliseconds (defaults to 500) */
  pollIntervalMs?: number;
}

/**
 * Guider Process Service
 *
 * Starts, watches and stops the guiding application. Knows nothing about the
 * session itself; reachability is probed through a {@link ConnectionFactory}
 * and shutdown goes through whatever client it is handed.
 */
export class ProcessService {
  private handle?: ProcessHandle;
  private readonly spawner: ProcessSpawner;
  private readonly factory: ConnectionFactory;
  private readonly shutdownTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private commands: ServiceCommand[];

  constructor(private readonly config: GuiderConfig, private readonly options: ProcessServiceOptions = {}) {
    this.spawner = options.spawner ?? new ChildProcessSpawner();
    this.factory = options.connectionFactory ?? new TcpConnectionFactory();
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 10_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.commands = [
      {
        name: "start",
        description: "Start the guiding application and wait until it accepts connections",
        parameters: [
          { name: "executable", alias: "e", type: "string", description: "Path to the executable" },
        ],
        action: async (args, context) => {
          const executable = args.options.executable;
          await this.start(typeof executable === "string" ? executable : undefined);
          context.write(this.isRunning() ? `Started (pid ${this.handle?.pid ?? "unknown"})` : "Already running");
        },
      },
      {
        name: "stop",
        description: "Shut down the guiding application",
        action: async (_args, context) => {
          const client = this.options.client;
          if (client && !client.isConnected() && await this.isReachable()) {
            await client.connect();
          }
          await this.stop();
          context.write("Stopped");
        },
      },
      {
        name: "running",
        description: "Report whether the guiding application is reachable",
        action: async (_args, context) => {
          const reachable = await this.isReachable();
          context.write(`managed: ${this.isRunning()}, reachable: ${reachable}`);
        },
      },
    ];
  }

  /**
   * Get service configuration
   */
  getConfig(): ServiceConfig {
    return {
      name: "process",
      version: { major: 1, minor: 0, patch: 0 },
      commands: this.commands,
      healthCheck: async () => !this.handle || this.isRunning(),
    };
  }

  /**
   * Whether the process this service started is still alive.
   * Does not touch the network.
   */
  isRunning(): boolean {
    return this.handle !== undefined && !this.handle.hasExited();
  }

  /** Process id of the managed process, if any. */
  get pid(): number | undefined {
    return this.isRunning() ? this.handle?.pid : undefined;
  }

  /** Whether something accepts connections on the configured port. */
  isReachable(): Promise<boolean> {
    return this.factory.canConnect({
      host: this.config.host,
      port: this.config.port,
      timeoutMs: Math.min(this.config.connectionTimeoutMs, 2_000),
    });
  }

  /**
   * Starts the guiding application unless it is already reachable, then
   * waits until it accepts connections.
   *
   * @param executablePath - Overrides the configured path and default locations.
   * @throws {ProcessAlreadyRunningError} If this service already manages a live process.
   * @throws {ExecutableNotFoundError} If the executable cannot be found.
   * @throws {ProcessStartFailedError} If spawning fails or the process exits early.
   * @throws {TimeoutError} If it does not become reachable in time (it is killed).
   */
  async start(executablePath = this.config.executablePath): Promise<void> {
    if (this.handle) {
      if (this.isRunning()) {
        throw new ProcessAlreadyRunningError(this.handle.pid);
      }
      this.handle = undefined;
    }

    if (await this.isReachable()) {
      console.log(`[ProcessService.start] Guider already listening on ${this.config.host}:${this.config.port}, not spawning`);
      return;
    }

    const executable = this.resolveExecutable(executablePath);
    console.log(`[ProcessService.start] Starting ${executable}`);
    const handle = await this.spawner.spawn(executable, this.config.spawnEnv);
    this.handle = handle;

    try {
      await this.waitUntilReachable(this.config.connectionTimeoutMs);
    } catch (error) {
      console.error(`[ProcessService.start] ${errorMessage(error)}`);
      await handle.kill();
      this.handle = undefined;
      throw error;
    }
    console.log(`[ProcessService.start] Guider ready (pid ${handle.pid ?? "unknown"})`);
  }

  /**
   * Polls reachability until it succeeds. Fails early if the managed process
   * exits meanwhile.
   *
   * @throws {TimeoutError} If not reachable within `timeoutMs`.
   * @throws {ProcessStartFailedError} If the managed process exits first.
   */
  async waitUntilReachable(timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await this.isReachable()) {
        return;
      }
      if (this.handle?.hasExited()) {
        throw new ProcessStartFailedError(`process exited prematurely with status ${this.handle.exitStatus ?? "unknown"}`);
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(
          `Guider not reachable on ${this.config.host}:${this.config.port} within ${timeoutMs}ms`,
          timeoutMs,
        );
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  /**
   * Shuts the guiding application down.
   *
   * With a connected client the application is asked to exit, then given
   * `shutdownTimeoutMs` before it is killed. Without one, a managed process
   * is killed right away.
   */
  async stop(client = this.options.client): Promise<void> {
    let asked = false;
    if (client?.isConnected()) {
      try {
        await client.call("shutdown");
        asked = true;
      } catch (error) {
        // The application may drop the session before answering.
        if (isGuiderError(error, "CONNECTION_LOST")) {
          asked = true;
        } else {
          console.warn(`[ProcessService.stop] Graceful shutdown failed: ${errorMessage(error)}`);
        }
      }
    }

    const handle = this.handle;
    if (!handle) {
      return;
    }

    if (asked && await handle.waitForExit(this.shutdownTimeoutMs)) {
      console.log("[ProcessService.stop] Guider exited");
    } else {
      console.warn(`[ProcessService.stop] Killing guider process ${handle.pid ?? ""}`.trim());
      await handle.kill();
    }
    this.handle = undefined;
  }

  private resolveExecutable(override?: string): string {
    const exists = this.options.search?.exists ?? existsSync;
    if (override !== undefined) {
      if (!exists(override)) {
        throw new ExecutableNotFoundError(override);
      }
      return override;
    }

    const found = findDefaultExecutable(this.options.search);
    if (!found) {
      throw new ExecutableNotFoundError();
    }
    return found;
  }
}
