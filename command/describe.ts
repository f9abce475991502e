import { resolve } from "node:path";
import { Command, CommanderError } from "commander";
import packageJson from "../package.json";
import { createDescriberAgent } from "../agents/describer/describer.agent";
import type { Env } from "../core/config";
import { DescribeError, ExitCode, UsageError, exitCodeFor } from "../core/errors";
import type { ExitCodeValue } from "../core/errors";
import { createLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import { runDescribe } from "../orchestrator/describe";
import type { DescribeDeps } from "../orchestrator/describe";
import { readBranchDiff } from "../orchestrator/git";

interface DescribeOptions {
  repo?: string;
  quiet?: boolean;
}

interface CliDeps extends Pick<DescribeDeps, "readDiff" | "createAgent"> {
  env: Env;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const validateTargetBranch = (raw: string) => {
  const targetBranch = raw.trim();
  if (targetBranch.length === 0) {
    throw new UsageError("target branch must not be empty.");
  }
  if (targetBranch.startsWith("-")) {
    throw new UsageError(`target branch must not start with '-': ${targetBranch}`);
  }
  return targetBranch;
};

const createProgram = (
  deps: CliDeps,
  onLogger: (logger: Logger) => void
) => {
  const program = new Command();

  program
    .name("pr-describe")
    .description(
      "Generate a pull-request description from the diff against a target branch."
    )
    .version(packageJson.version)
    .argument("<target-branch>", "Branch to diff the working tree against.")
    .argument(
      "[model]",
      "Model identifier (defaults to $OPENAI_MODEL, then gpt-4)."
    )
    .option("-C, --repo <path>", "Run git in this directory.")
    .option("-q, --quiet", "Only log warnings and errors.")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr,
      // Commander errors are reported once, by runCli.
      outputError: () => undefined,
    })
    .action(
      async (
        rawTarget: string,
        model: string | undefined,
        options: DescribeOptions
      ) => {
        const targetBranch = validateTargetBranch(rawTarget);
        const logger = createLogger({
          write: (line) => deps.stderr(`${line}\n`),
          quiet: options.quiet ?? false,
        });
        onLogger(logger);

        await runDescribe(
          {
            targetBranch,
            model,
            repoRoot: resolve(deps.cwd, options.repo ?? "."),
          },
          {
            env: deps.env,
            logger,
            readDiff: deps.readDiff,
            createAgent: deps.createAgent,
            writeOutput: deps.stdout,
          }
        );
      }
    );

  return program;
};

const stripCommanderPrefix = (message: string) => message.replace(/^error:\s*/, "");

/**
 * Runs one invocation and returns the process exit code. Never throws.
 */
const runCli = async (argv: string[], deps: CliDeps): Promise<ExitCodeValue> => {
  let logger = createLogger({ write: (line) => deps.stderr(`${line}\n`) });
  const program = createProgram(deps, (configured) => {
    logger = configured;
  });

  const reportUsage = (error: UsageError) => {
    logger.error(error.message);
    deps.stderr(program.helpInformation());
    return error.exitCode;
  };

  try {
    await program.parseAsync(argv, { from: "user" });
    return ExitCode.Success;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version
      if (error.exitCode === 0) {
        return ExitCode.Success;
      }
      return reportUsage(new UsageError(stripCommanderPrefix(error.message)));
    }
    if (error instanceof UsageError) {
      return reportUsage(error);
    }
    if (error instanceof DescribeError) {
      logger.error(error.message, { scope: error.name });
    } else {
      logger.error("Unexpected failure.", { data: error });
    }
    return exitCodeFor(error);
  }
};

const defaultCliDeps = (): CliDeps => ({
  env: process.env,
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readDiff: readBranchDiff,
  createAgent: (config) =>
    createDescriberAgent({ apiKey: config.apiKey, baseUrl: config.baseUrl }),
});

export { createProgram, defaultCliDeps, runCli };
export type { CliDeps, DescribeOptions };
