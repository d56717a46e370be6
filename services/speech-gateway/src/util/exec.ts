import { spawn } from "node:child_process";
import { log } from "./log";

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type ExecFileFn = (file: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

/**
 * Runs a binary to completion and collects its output. Spawn failures (a
 * missing binary surfaces as `ENOENT`) reject; a timeout kills the child and
 * resolves with `timedOut: true`.
 */
export const execFile: ExecFileFn = async (file, args, opts) => {
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  return await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: opts?.cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      log.warn("exec timeout, killing process", { file, timeoutMs });
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (stdout += d));
    child.stderr.on("data", (d: string) => (stderr += d));

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code: code ?? (timedOut ? -1 : 0), stdout, stderr, timedOut });
    });
  });
};
