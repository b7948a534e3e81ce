/**
 * Main CLI setup using Commander.js
 *
 * Creates the program with global options and registers the command modules
 */
import { Command, Option } from "commander";
import {
  configureLogger,
  logger,
  type ModelClient,
  type ModelConfig,
  type WorkbookLoader,
} from "@tutor-eval/eval";
import { createRunCommand } from "./commands/run.js";
import { createReportCommand } from "./commands/report.js";
import { createModelsCommand } from "./commands/models.js";
import { toCliError } from "./errors.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

/**
 * CLI name
 */
export const CLI_NAME = "tutor-eval";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Seams the commands take for tests; production uses the defaults
 */
export interface CliDependencies {
  /** Client factory (default: pick by provider tag) */
  createClient?: (config: ModelConfig) => ModelClient;
  /** Workbook factory for the spreadsheet export */
  loadWorkbook?: WorkbookLoader;
  /** Environment consulted for API keys */
  env?: Readonly<Record<string, string | undefined>>;
  /** Source of the results document timestamp */
  clock?: () => Date;
}

/**
 * Apply global options to the logger before any command runs
 */
function setupGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();

  configureLogger({
    verbose: opts.verbose,
    quiet: opts.quiet,
    noColor: opts.color === false,
    json: opts.json,
  });

  return opts;
}

/**
 * Create the main CLI program
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Benchmark chat models as a children's English tutor")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ tutor-eval run                          Test every configured model
  $ tutor-eval run --models qwen deepseek   Test selected models
  $ tutor-eval run --cases greeting-01      Run selected test cases
  $ tutor-eval report --detailed            Rebuild reports from saved results
  $ tutor-eval models                       Check model credentials`
    );

  // Global options
  program
    .addOption(
      new Option("-v, --verbose", "Enable verbose output").default(false)
    )
    .addOption(
      new Option("-q, --quiet", "Minimize output (only errors)").default(false)
    )
    .addOption(
      new Option("--no-color", "Disable color output")
    )
    .addOption(
      new Option("--json", "Output in JSON format").default(false)
    );

  program.hook("preAction", (_thisCommand, actionCommand) => {
    setupGlobalOptions(actionCommand);
  });

  program.addCommand(createRunCommand(deps));
  program.addCommand(createReportCommand(deps));
  program.addCommand(createModelsCommand(deps));

  return program;
}

/**
 * Run the CLI program
 */
export async function run(args?: string[], deps: CliDependencies = {}): Promise<void> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(args ?? process.argv);
  } catch (err) {
    const cliError = toCliError(err);
    logger.error(cliError.message);
    if (cliError.suggestion) {
      logger.info(cliError.suggestion);
    }
    process.exitCode = cliError.exitCode;
  }
}
