import type { CommandResult } from "@dnsha/core";

export interface CommandDescriptor {
  command: string;
  args: string[];
}

export interface HttpProbeResult {
  status: number;
}

/**
 * ICommandExecutor: the only I/O seam the reconciliation and health engines
 * depend on.
 *
 * `run` resolves with the exit code and captured output of a finished
 * process, including non-zero exits. It rejects on timeout or when the
 * process cannot be started.
 */
export interface ICommandExecutor {
  run(descriptor: CommandDescriptor, timeoutMs: number): Promise<CommandResult>;

  /** Rejects on timeout and transport errors; any HTTP status resolves. */
  httpGet(url: string, timeoutMs: number): Promise<HttpProbeResult>;
}

export class CommandTimeoutError extends Error {
  constructor(descriptor: CommandDescriptor, readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${descriptor.command} ${descriptor.args.join(" ")}`);
    this.name = "CommandTimeoutError";
  }
}

export class CommandOutputLimitError extends Error {
  constructor(descriptor: CommandDescriptor, readonly maxBytes: number) {
    super(`Command output exceeded ${maxBytes} bytes: ${descriptor.command} ${descriptor.args.join(" ")}`);
    this.name = "CommandOutputLimitError";
  }
}

/**
 * Injection token for ICommandExecutor.
 */
export const COMMAND_EXECUTOR = Symbol("COMMAND_EXECUTOR");
