import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type ExecResult = { stdout: string; stderr: string };

export type ExecOptions = {
  cwd: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
};

export type ExecFn = (file: string, args: readonly string[], opts: ExecOptions) => Promise<ExecResult>;

export const execFileAsync: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, [...args], {
    cwd: opts.cwd,
    signal: opts.signal,
    env: opts.env,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/** stderr + stdout carried by a failed child process, or the message. */
export function execOutput(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  const parts: string[] = [];
  if ("stderr" in e && typeof e.stderr === "string") parts.push(e.stderr);
  if ("stdout" in e && typeof e.stdout === "string") parts.push(e.stdout);
  parts.push(e.message);
  return parts.filter((p) => p.trim().length > 0).join("\n");
}
