import { spawn } from "child_process";

export interface AzResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Runs one `az` invocation. Injected so the pipeline can be driven without the real CLI. */
export type AzRunner = (args: string[]) => Promise<AzResult>;

/**
 * Quote one argument for cmd.exe, which receives the joined command line as-is when
 * spawn runs with `shell: true`.
 */
export function quoteForCmd(arg: string): string {
  if (arg === "") return '""';
  if (!/[\s"&|<>^()]/.test(arg)) return arg;
  return `"${arg.replace(/"/g, '\\"')}"`;
}

/**
 * Build a runner for `az`. Windows goes through the shell so `az.cmd` resolves, with each
 * argument quoted. A missing binary resolves with code 127 rather than rejecting, so
 * callers only branch on the exit code.
 */
export function createAzRunner(platform: NodeJS.Platform = process.platform): AzRunner {
  const shell = platform === "win32";
  return (args) =>
    new Promise((resolve) => {
      const child = spawn("az", shell ? args.map(quoteForCmd) : args, {
        stdio: ["ignore", "pipe", "pipe"],
        shell,
      });

      let stdout = "";
      let stderr = "";
      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (err) => resolve({ code: 127, stdout, stderr: stderr || err.message }));
      child.on("close", (code) => resolve({ code: code ?? 1, stdout, stderr }));
    });
}

export const runAz: AzRunner = createAzRunner();

export type CliCheck = "ok" | "not-installed" | "not-authenticated";

/** Check that the Azure CLI is installed and signed in. */
export async function checkAzCli(az: AzRunner): Promise<CliCheck> {
  const version = await az(["--version"]);
  if (version.code !== 0) return "not-installed";

  const account = await az(["account", "show", "--output", "none"]);
  if (account.code !== 0) return "not-authenticated";

  return "ok";
}

/** Last non-empty stderr line, which is where az puts its error summary. */
export function lastErrorLine(result: AzResult): string {
  const lines = result.stderr.split("\n").map((l) => l.trim()).filter(Boolean);
  return lines.at(-1) ?? `exit code ${result.code}`;
}
