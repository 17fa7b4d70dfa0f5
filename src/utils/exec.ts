import { exec as cpExec } from "child_process";
import { DeviceManagementError } from "../wda/errors.js";

const DEFAULT_TIMEOUT = 15_000;

export interface ExecOptions {
  timeout?: number;
  maxBuffer?: number;
}

/** Wraps an argument in single quotes for the shell. */
export function quote(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

function failure(
  command: string,
  error: { message: string; code?: number | string | null; killed?: boolean },
  stderr: string,
): DeviceManagementError {
  const exitCode = typeof error.code === "number" ? error.code : undefined;
  const detail = error.killed ? "timed out" : stderr.trim() || error.message;
  return new DeviceManagementError(command, `Command failed: ${command}\n${detail}`, exitCode, stderr);
}

export function exec(command: string, options?: ExecOptions): Promise<string> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options?.maxBuffer ?? 10 * 1024 * 1024; // 10 MB

  return new Promise((resolve, reject) => {
    cpExec(command, { timeout, maxBuffer }, (error, stdout, stderr) => {
      if (error) {
        reject(failure(command, error, stderr));
        return;
      }
      resolve(stdout);
    });
  });
}

export function execBuffer(command: string, options?: ExecOptions): Promise<Buffer> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options?.maxBuffer ?? 50 * 1024 * 1024;

  return new Promise((resolve, reject) => {
    cpExec(
      command,
      { timeout, maxBuffer, encoding: "buffer" },
      (error, stdout, stderr) => {
        if (error) {
          reject(failure(command, error, stderr.toString()));
          return;
        }
        resolve(stdout);
      },
    );
  });
}
