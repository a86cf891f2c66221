import { createLogger } from "@daybook/logger";

import { loadEnvironment, loadRunnerConfig } from "./config.js";
import { runFromConfig } from "./runner.js";

export { loadEnvironment, loadRunnerConfig, RunnerEnvSchema, DEFAULT_INITIAL_CASH } from "./config.js";
export type { RunnerConfig } from "./config.js";
export {
  isDecisionMaker,
  loadCustomDecisionMakers,
  resolveDecisionMaker,
} from "./decisionMakerLoader.js";
export type {
  CustomDecisionMaker,
  CustomDecisionMakerMetadata,
  LoaderOptions,
} from "./decisionMakerLoader.js";
export { ENGINE_VERSION, createRunWriter, runFromConfig } from "./runner.js";
export type { RunOutcome, RunWriter, RunnerDependencies } from "./runner.js";

const logger = createLogger("services/sim-runner");

const main = async (): Promise<void> => {
  loadEnvironment();
  const config = loadRunnerConfig();
  logger.info("Starting simulation run", {
    runName: config.runName,
    decisionMaker: config.decisionMaker.key,
  });
  const { runDir } = await runFromConfig(config, { logger });
  logger.info("Simulation run complete", { runDir });
};

const shouldAutostart = process.env.SIM_RUNNER_AUTOSTART !== "false";

if (shouldAutostart) {
  void main().catch((error: unknown) => {
    logger.error("Simulation run failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
