import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  maxBufferBytes?: number;
}

type ExecFailure = Error & {
  code?: number | string;
  stdout?: Buffer | string;
  stderr?: Buffer | string;
};

function isExecFailure(err: unknown): err is ExecFailure {
  return err instanceof Error;
}

/**
 * Runs a binary without a shell and returns its raw stdout, so callers can
 * read binary output such as decoded audio.
 */
export async function runCommand(
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<{ stdout: Buffer; stderr: string; exitCode: number }> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      maxBuffer: options?.maxBufferBytes,
      encoding: "buffer",
    });

    return { stdout, stderr: stderr.toString("utf8"), exitCode: 0 };
  } catch (err) {
    if (!isExecFailure(err)) throw err;
    const stderr = err.stderr?.toString() || err.message;
    const exitCode = typeof err.code === "number" ? err.code : 1;
    throw new Error(`Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}`, {
      cause: err,
    });
  }
}
