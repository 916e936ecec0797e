// src/core/backend/commandRunner.ts
// Child-process runner used for the external optimizer and compiler

import { spawn } from "child_process";

export type CommandResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  code: number | null;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
};

/** Runs argv[0] with the remaining arguments; never rejects. */
export type CommandRunner = (argv: string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (argv, options = {}) => {
  const [cmd, ...args] = argv;
  if (!cmd) return { ok: false, stdout: "", stderr: "empty argv", code: 127 };

  return await new Promise<CommandResult>((resolve) => {
    const child = spawn(cmd, args, { cwd: options.cwd, stdio: "pipe", shell: process.platform === "win32" });

    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (d: string) => { stdout += d; });
    child.stderr.on("data", (d: string) => { stderr += d; });

    let killed = false;
    let t: ReturnType<typeof setTimeout> | undefined;
    if (options.timeoutMs != null) {
      t = setTimeout(() => {
        killed = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);
    }

    child.on("close", (code) => {
      if (t) clearTimeout(t);
      resolve({ ok: !killed && code === 0, stdout, stderr, code });
    });

    child.on("error", (err) => {
      if (t) clearTimeout(t);
      resolve({ ok: false, stdout, stderr: err.message, code: null });
    });
  });
};
