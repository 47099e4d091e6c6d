/**
 * Gateway process handoff.
 *
 * Node cannot exec() over itself, so the gateway runs as a child with the
 * parent's stdio and environment. Termination signals are forwarded and the
 * child's exit status becomes the entrypoint's. There is no supervision:
 * when the gateway exits, so does the container.
 */
import { spawn, type SpawnOptions } from "node:child_process";
import os from "node:os";
import type { Logger } from "../shared/logger.js";

/** Exit code used when the gateway binary cannot be started. */
export const EXIT_SPAWN_FAILED = 127;

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/** The slice of ChildProcess the handoff relies on. */
export interface GatewayChild {
  readonly pid?: number | undefined;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnGateway = (command: string, args: string[], options: SpawnOptions) => GatewayChild;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface GatewayCommand {
  command: string;
  args: string[];
}

export interface HandOffOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Custom spawn (for testing). */
  spawn?: SpawnGateway;
  /** Where termination signals arrive. Defaults to the current process. */
  signals?: SignalSource;
}

/** `nanobot gateway`, with `--port` only when asked for. */
export function buildGatewayCommand(command: string, port: number | null): GatewayCommand {
  const args = ["gateway"];
  if (port !== null) {
    args.push("--port", String(port));
  }
  return { command, args };
}

/** Map a child's exit to a shell-style status: the code, or 128 + signal number. */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + os.constants.signals[signal];
  return 1;
}

const defaultSpawn: SpawnGateway = (command, args, options) => spawn(command, args, options);

/**
 * Run the gateway in the foreground and resolve with its exit status.
 * Never rejects: a spawn failure resolves with EXIT_SPAWN_FAILED.
 */
export function handOff(gateway: GatewayCommand, options: HandOffOptions = {}): Promise<number> {
  const { logger } = options;
  const signalSource = options.signals ?? process;
  const spawnGateway = options.spawn ?? defaultSpawn;

  logger?.info(`Starting ${[gateway.command, ...gateway.args].join(" ")}`);

  return new Promise((resolve) => {
    let settled = false;
    const forwarders = new Map<NodeJS.Signals, () => void>();

    const finish = (status: number) => {
      if (settled) return;
      settled = true;
      for (const [signal, forward] of forwarders) {
        signalSource.off(signal, forward);
      }
      resolve(status);
    };

    let child: GatewayChild;
    try {
      child = spawnGateway(gateway.command, gateway.args, {
        stdio: "inherit",
        env: options.env ?? process.env,
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      logger?.error(`Failed to start gateway: ${msg}`);
      finish(EXIT_SPAWN_FAILED);
      return;
    }

    for (const signal of FORWARDED_SIGNALS) {
      const forward = () => {
        logger?.debug(`Forwarding ${signal} to gateway`);
        child.kill(signal);
      };
      forwarders.set(signal, forward);
      signalSource.on(signal, forward);
    }

    child.on("error", (error) => {
      logger?.error(`Failed to start gateway: ${error.message}`);
      finish(EXIT_SPAWN_FAILED);
    });

    child.on("exit", (code, signal) => {
      const status = exitStatus(code, signal);
      if (status === 0) {
        logger?.info("Gateway exited");
      } else {
        logger?.warn(`Gateway exited with status ${status}${signal ? ` (${signal})` : ""}`);
      }
      finish(status);
    });
  });
}
