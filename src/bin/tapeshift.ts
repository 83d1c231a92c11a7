#!/usr/bin/env node
import { logLevelFor, StructuredLogger } from "../adapters/structured-logger.js";
import { type CliOptions, HELP_TEXT, parseArgs } from "../cli/args.js";
import { convertFile } from "../cli/convert-file.js";
import { loadConfigFile } from "../config/load-config.js";
import { errorMessage } from "../errors.js";
import { DEFAULT_CONFIG } from "../types/config.js";

const MODEL_NAMES = { infinite: "Infinite", sipser: "Sipser" } as const;

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}\nRun with --help for usage.`);
    process.exit(1);
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  const logger = new StructuredLogger({
    component: "tapeshift",
    level: logLevelFor(options.verbose),
  });

  try {
    const config = options.configPath ? await loadConfigFile(options.configPath) : DEFAULT_CONFIG;
    const result = await convertFile({ inputPath: options.inputPath, config, logger });
    console.log(
      `Successfully converted to ${MODEL_NAMES[result.targetModel]} model.\n` +
        `  Input:  ${result.inputPath}\n` +
        `  Output: ${result.outputPath}`,
    );
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
