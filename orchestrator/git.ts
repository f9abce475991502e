import { spawn } from "node:child_process";
import { GitError } from "../core/errors";

interface GitCommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

const runGitCommand = (args: string[], cwd: string) =>
  new Promise<GitCommandResult>((resolve, reject) => {
    const proc = spawn("git", args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    proc.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.once("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      reject(new GitError(args, null, error.message, { cause: error }));
    });

    proc.once("close", (code) => {
      if (settled) {
        return;
      }
      settled = true;
      // A null code means git was killed by a signal.
      const exitCode = code ?? -1;
      resolve({
        ok: exitCode === 0,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        exitCode,
      });
    });
  });

const diffArgs = (targetBranch: string) => [
  "diff",
  "--no-color",
  "--no-ext-diff",
  targetBranch,
];

/**
 * Returns `git diff <targetBranch>` for the checkout in `repoRoot`: the
 * working tree compared against the target branch.
 */
const readBranchDiff = async (targetBranch: string, repoRoot: string) => {
  const args = diffArgs(targetBranch);
  const result = await runGitCommand(args, repoRoot);
  if (!result.ok) {
    const message = result.stderr || result.stdout || "Unknown error.";
    throw new GitError(args, result.exitCode, message);
  }
  return result.stdout;
};

export { diffArgs, readBranchDiff, runGitCommand };
export type { GitCommandResult };
