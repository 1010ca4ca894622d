import { spawn } from "child_process";

export interface ToolInvocation {
  cwd: string;
  env?: Record<string, string>;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
}

/**
 * Seam through which pipelines invoke external toolchains (cargo,
 * wasm-bindgen). Tests substitute an in-process fake.
 */
export interface ToolRunner {
  run(command: string, args: string[], options: ToolInvocation): Promise<ToolResult>;
}

export class ToolError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, command: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export const spawnToolRunner: ToolRunner = {
  run(command, args, { cwd, env }) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...env },
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout.on("data", (chunk) => {
        stdoutChunks.push(Buffer.from(chunk));
      });

      child.stderr.on("data", (chunk) => {
        stderrChunks.push(Buffer.from(chunk));
      });

      child.on("error", (error) => {
        reject(new ToolError(`failed to launch ${command}: ${error.message}`, command, null, "", { cause: error }));
      });

      child.on("close", (exitCode) => {
        const stdout = Buffer.concat(stdoutChunks).toString("utf8");
        const stderr = Buffer.concat(stderrChunks).toString("utf8");
        if (exitCode !== 0) {
          const tail = stderr.trim().split(/\r?\n/).slice(-20).join("\n");
          reject(new ToolError(`${command} ${args.join(" ")} exited with code ${exitCode}${tail ? `\n${tail}` : ""}`, command, exitCode, stderr));
          return;
        }
        resolve({ stdout, stderr });
      });
    });
  },
};
