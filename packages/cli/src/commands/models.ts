/**
 * tutor-eval models command
 *
 * Lists the configured models and whether their credentials are complete.
 */

import { Command, Option } from "commander";
import * as fs from "node:fs";
import {
  createModelClient,
  loadModelsConfig,
  logger,
  renderGridTable,
  resolveConfigPaths,
  type ModelClient,
  type ModelConfig,
} from "@tutor-eval/eval";
import type { CliDependencies } from "../cli.js";
import { configError } from "../errors.js";
import { DEFAULT_CONFIG_DIR } from "./run.js";

/**
 * One row of the model listing
 */
export interface ModelStatus {
  key: string;
  name: string;
  provider: string;
  modelId: string;
  enabled: boolean;
  ready: boolean;
  missing: string[];
  hint?: string;
}

/**
 * Collect the credential status of every configured model
 */
export async function collectModelStatus(
  configDir: string,
  deps: CliDependencies = {}
): Promise<ModelStatus[]> {
  const paths = await resolveConfigPaths(configDir);
  if (!fs.existsSync(paths.models)) {
    throw configError(
      `Configuration file not found: ${paths.models}`,
      `Create models.yaml (or models.json) in ${configDir}.`
    );
  }

  const { models } = await loadModelsConfig(paths.models);
  const createClient =
    deps.createClient ??
    ((config: ModelConfig): ModelClient => createModelClient(config, { env: deps.env }));

  return Object.entries(models).map(([key, config]) => {
    const check = createClient(config).checkConfig();
    return {
      key,
      name: config.name,
      provider: config.provider,
      modelId: config.modelId,
      enabled: config.enabled !== false,
      ready: check.ok,
      missing: [...check.missing],
      hint: check.hint,
    };
  });
}

/**
 * Execute the models command
 */
export async function executeModelsCommand(
  configDir: string,
  deps: CliDependencies = {}
): Promise<ModelStatus[]> {
  const statuses = await collectModelStatus(configDir, deps);

  if (logger.getOptions().json) {
    logger.json(statuses);
    return statuses;
  }

  if (statuses.length === 0) {
    logger.warn("No models configured");
    return statuses;
  }

  console.log(
    renderGridTable(
      ["Key", "Name", "Provider", "Model ID", "Enabled", "Credentials"],
      statuses.map((status) => [
        status.key,
        status.name,
        status.provider,
        status.modelId,
        status.enabled ? "yes" : "no",
        status.ready ? "ok" : `missing ${status.missing.join(", ")}`,
      ])
    )
  );

  for (const status of statuses) {
    if (!status.ready && status.hint) {
      logger.info(`${status.name}: get a key at ${status.hint}`);
    }
  }

  return statuses;
}

/**
 * Create the models command
 *
 * @returns Commander command for 'tutor-eval models'
 */
export function createModelsCommand(deps: CliDependencies = {}): Command {
  const command = new Command("models")
    .description("List configured models and check their credentials")
    .addOption(
      new Option("--config-dir <dir>", "Configuration directory").default(DEFAULT_CONFIG_DIR)
    )
    .action(async (options: Record<string, unknown>) => {
      await executeModelsCommand(
        typeof options.configDir === "string" ? options.configDir : DEFAULT_CONFIG_DIR,
        deps
      );
    });

  return command;
}
