import { spawn } from "node:child_process";
import { TimeoutError } from "./errors.js";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export function runCommand(
  cmd: string,
  args: string[],
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
  } = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: "pipe"
    });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk) => {
      stdout += String(chunk);
    });
    proc.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    let timedOut = false;
    let timeoutHandle: NodeJS.Timeout | null = null;
    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGTERM");
      }, options.timeoutMs);
    }

    proc.on("close", (code) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      resolve({
        code: timedOut ? -1 : code ?? 0,
        stdout,
        stderr: timedOut ? `${stderr}\nTimed out` : stderr
      });
    });

    proc.on("error", (err) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      resolve({ code: -1, stdout, stderr: `${stderr}\n${err.message}` });
    });
  });
}

export async function commandExists(command: string): Promise<boolean> {
  const result = await runCommand("bash", ["-lc", `command -v ${command}`], { timeoutMs: 3000 });
  return result.code === 0;
}

/**
 * Rejects with a {@link TimeoutError} when `promise` has not settled within `timeoutMs`.
 * The underlying operation keeps running; only the caller stops waiting.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) {
    return await promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function chunkText(text: string, size: number): string[] {
  if (text.length <= size) {
    return [text];
  }
  const chunks: string[] = [];
  let index = 0;
  while (index < text.length) {
    const end = Math.min(index + size, text.length);
    chunks.push(text.slice(index, end));
    index = end;
  }
  return chunks;
}

export function nowIso(): string {
  return new Date().toISOString();
}

// j***n@example.com
export function maskEmail(email: string): string {
  const at = email.lastIndexOf("@");
  if (at <= 0) {
    return "***";
  }
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  const masked = local.length <= 2 ? `${local[0]}***` : `${local[0]}***${local[local.length - 1]}`;
  return `${masked}@${domain}`;
}
