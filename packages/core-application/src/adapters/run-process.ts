import { spawn } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";

import { CommandFailedError } from "../application/errors";

export type ProcessResult = { code: number; stdout: string; stderr: string };

export type RunProcessOptions = {
  env?: Record<string, string>;
  /** Stream stdout into this file instead of buffering it. */
  stdoutFile?: string;
  /** Feed this file to stdin. */
  stdinFile?: string;
};

/**
 * Spawns `bin` without a shell and waits for it to exit. Never rejects for a
 * non-zero exit: callers inspect `code` (127 when the binary could not be
 * started).
 */
export async function runProcess(
  bin: string,
  args: string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  const child = spawn(bin, args, {
    shell: false,
    env: { ...process.env, ...options.env },
    stdio: ["pipe", "pipe", "pipe"],
  });

  let stdout = "";
  let stderr = "";
  child.stderr.on("data", (b: Buffer) => (stderr += b.toString()));

  // settle transfers immediately so an early EPIPE is never an unhandled rejection
  const transfers: Promise<unknown>[] = [];
  if (options.stdoutFile) {
    transfers.push(
      pipeline(child.stdout, createWriteStream(options.stdoutFile)).then(
        () => null,
        (err: unknown) => err
      )
    );
  } else {
    child.stdout.on("data", (b: Buffer) => (stdout += b.toString()));
  }

  if (options.stdinFile) {
    transfers.push(
      pipeline(createReadStream(options.stdinFile), child.stdin).then(
        () => null,
        (err: unknown) => err
      )
    );
  } else {
    child.stdin.end();
  }

  const code = await new Promise<number>((resolve) => {
    child.on("error", (err) => {
      stderr += `Failed to run ${bin}: ${err.message}`;
      resolve(127);
    });
    child.on("close", (exitCode) => resolve(exitCode ?? 1));
  });

  const transferErrors = (await Promise.all(transfers)).filter((e) => e !== null);
  if (code === 0 && transferErrors.length > 0) {
    const first = transferErrors[0];
    return {
      code: 1,
      stdout,
      stderr: stderr + (first instanceof Error ? first.message : String(first)),
    };
  }

  return { code, stdout, stderr };
}

export function assertSucceeded(result: ProcessResult, command: string): ProcessResult {
  if (result.code === 0) return result;

  const detail = result.stderr.trim() || result.stdout.trim() || "no output";
  throw new CommandFailedError(
    `${command} exited with code ${result.code}: ${detail}`,
    command,
    result.code,
    result.stderr
  );
}
