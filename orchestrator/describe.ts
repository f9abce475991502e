import { buildDescriberPrompt } from "../agents/describer/describer.prompt";
import type { DescriberAgent } from "../agents/describer/describer.types";
import { loadConfig, resolveModel } from "../core/config";
import type { AppConfig, Env } from "../core/config";
import type { Logger } from "../core/logger";
import { estimateTokens, formatTokens } from "../core/tokens";

interface DescribeParams {
  targetBranch: string;
  model?: string;
  repoRoot: string;
}

interface DescribeDeps {
  env: Env;
  logger: Logger;
  readDiff: (targetBranch: string, repoRoot: string) => Promise<string>;
  createAgent: (config: AppConfig) => DescriberAgent;
  writeOutput: (text: string) => void;
}

/**
 * Config, then `git diff`, then one model request. Nothing reaches
 * `writeOutput` unless every step succeeded.
 */
const runDescribe = async (
  params: DescribeParams,
  deps: DescribeDeps
): Promise<string> => {
  const config = loadConfig(deps.env);
  const model = resolveModel(params.model, config);

  deps.logger.info(`Diffing working tree against '${params.targetBranch}'`, {
    scope: "git",
  });
  const diff = await deps.readDiff(params.targetBranch, params.repoRoot);
  if (diff.trim().length === 0) {
    deps.logger.warn(
      `No changes found against '${params.targetBranch}'; the description will have little to go on.`,
      { scope: "git" }
    );
  }

  const prompt = buildDescriberPrompt(diff);
  deps.logger.info(
    `Requesting description (model=${model}, ~${formatTokens(
      estimateTokens(prompt)
    )} tokens)`,
    { scope: "openai" }
  );

  const agent = deps.createAgent(config);
  const description = await agent.describe({ prompt, model });

  deps.writeOutput(`${description}\n`);
  deps.logger.success("Description generated.", { scope: "openai" });
  return description;
};

export { runDescribe };
export type { DescribeDeps, DescribeParams };
