import { spawn, type ChildProcess } from "child_process";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

const REPO_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..", "..");

export const API_ENTRY = join(REPO_ROOT, "src", "api", "index.ts");
export const READY_TIMEOUT_MS = 30_000;
export const API_TIMEOUT_MS = 120_000;

/** Inherit the parent env, set NODE_ENV=test, then apply overrides. */
export function getCleanEnv(overrides: Record<string, string | undefined>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }

  env.NODE_ENV = "test";

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return env;
}

export function spawnServer(port: number, env: Record<string, string | undefined> = {}): ChildProcess {
  const debug = process.env.DEBUG === "1";

  const child = spawn(process.execPath, ["--import", "tsx", API_ENTRY], {
    cwd: REPO_ROOT,
    env: getCleanEnv({ PORT: port.toString(), ...env }),
    stdio: ["pipe", "pipe", "pipe"],
  });

  // Consume stdout/stderr to prevent pipe buffer pressure on Windows
  child.stdout?.on("data", (chunk: Buffer) => {
    if (debug) process.stdout.write(`[test-app:out] ${chunk}`);
  });
  child.stderr?.on("data", (chunk: Buffer) => {
    if (debug) process.stderr.write(`[test-app:err] ${chunk}`);
  });

  return child;
}

export function killServer(child: ChildProcess): Promise<void> {
  return new Promise<void>((resolve) => {
    if (child.exitCode !== null || child.killed) {
      resolve();
      return;
    }

    const timeout = setTimeout(() => {
      child.kill("SIGKILL");
    }, 3_000);

    child.once("exit", () => {
      clearTimeout(timeout);
      resolve();
    });

    child.kill("SIGTERM");
  });
}

/** Poll `/` (which makes no model call) until the service answers. */
export async function waitForReady(port: number, timeoutMs: number = READY_TIMEOUT_MS): Promise<boolean> {
  const start = Date.now();

  while (Date.now() - start < timeoutMs) {
    try {
      const res = await fetch(`http://localhost:${port}/`, {
        signal: AbortSignal.timeout(2_000),
      });
      if (res.ok) {
        const body = (await res.json()) as { status?: string };
        if (body.status === "running") return true;
      }
    } catch {
      // server not ready yet
    }
    await new Promise((r) => setTimeout(r, 500));
  }

  return false;
}
