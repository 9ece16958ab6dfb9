import { execFile } from "child_process";
import type { ExecFileException } from "child_process";
import { Injectable } from "@nestjs/common";
import type { CommandResult } from "@dnsha/core";
import { CommandOutputLimitError, CommandTimeoutError } from "./command-executor.interface";
import type { CommandDescriptor, HttpProbeResult, ICommandExecutor } from "./command-executor.interface";

export const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * Map the callback of execFile to a result. Non-zero exits resolve; a
 * timeout, an output overflow or a process that never started reject.
 */
export function settleExecution(
  descriptor: CommandDescriptor,
  timeoutMs: number,
  error: ExecFileException | null,
  stdout: string,
  stderr: string,
): CommandResult | Error {
  if (!error) {
    return { exitCode: 0, stdout, stderr };
  }

  // Checked before `killed`: the child is also killed when it overflows maxBuffer.
  if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
    return new CommandOutputLimitError(descriptor, MAX_OUTPUT_BYTES);
  }

  if (error.killed) {
    return new CommandTimeoutError(descriptor, timeoutMs);
  }

  // A numeric code is the exit status; anything else (ENOENT, EACCES)
  // means the process never ran.
  if (typeof error.code === "number") {
    return { exitCode: error.code, stdout, stderr };
  }

  return new Error(`Command failed: ${descriptor.command} ${descriptor.args.join(" ")}\n${stderr || error.message}`);
}

/**
 * Runs commands on the host with child_process.execFile and probes HTTP
 * endpoints with fetch.
 */
@Injectable()
export class ChildProcessExecutor implements ICommandExecutor {
  run(descriptor: CommandDescriptor, timeoutMs: number): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        descriptor.command,
        descriptor.args,
        { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf8" },
        (error, stdout, stderr) => {
          const settled = settleExecution(descriptor, timeoutMs, error, stdout, stderr);
          if (settled instanceof Error) {
            reject(settled);
          } else {
            resolve(settled);
          }
        },
      );
    });
  }

  async httpGet(url: string, timeoutMs: number): Promise<HttpProbeResult> {
    const response = await fetch(url, {
      method: "GET",
      signal: AbortSignal.timeout(timeoutMs),
    });
    // Drain the body so the socket is released.
    await response.arrayBuffer();
    return { status: response.status };
  }
}
