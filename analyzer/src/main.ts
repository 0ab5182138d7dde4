#!/usr/bin/env node
import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { describeError } from "@battery-savings/domain";
import { AnalysisService } from "./analysis/analysis.service";
import { AppModule } from "./app.module";
import { describeOptions, loadConfigDocument } from "./config/config-document";
import type { AnalyzerConfigDocument } from "./config/config-document";
import { resolveLogLevels } from "./config/logging";
import { validateAnalyzerConfig } from "./config/validation";

const USAGE = `Usage: battery-savings <input.json[.gz]> [options]

Estimates what a battery with perfect-foresight dispatch would have saved over
historical energy and price data.

Options (flag, environment variable, description):
`;

function configureFromArguments(argv: readonly string[], env: NodeJS.ProcessEnv): AnalyzerConfigDocument {
  const bootstrapLogger = new Logger("bootstrap");
  const document = loadConfigDocument(argv, env);

  const {levels, threshold, fallbackUsed} = resolveLogLevels(document.logging.level);
  Logger.overrideLogger(levels);
  if (fallbackUsed) {
    bootstrapLogger.warn(`Unknown log level '${document.logging.level}'; defaulting to info`);
  }
  bootstrapLogger.verbose(`Printing log levels up to '${threshold}'`);

  validateAnalyzerConfig(document);
  bootstrapLogger.verbose("Configuration validation successful.");
  return document;
}

async function bootstrap(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (argv.includes("--help") || argv.includes("-h")) {
    process.stdout.write(`${USAGE}${describeOptions()}\n`);
    return 0;
  }

  const document = configureFromArguments(argv, env);
  const app = await NestFactory.createApplicationContext(AppModule.forDocument(document), {
    logger: resolveLogLevels(document.logging.level).levels,
  });

  try {
    const outcome = await app.get(AnalysisService).run();
    process.stdout.write(`\n${outcome.report}\n`);
    if (outcome.viewerPath) {
      process.stdout.write(`\nVisualization file has been created: ${outcome.viewerPath}\n`);
      process.stdout.write("Open this file in a web browser to view the interactive visualization.\n");
    }
    return 0;
  } finally {
    await app.close();
  }
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      new Logger("battery-savings").error(describeError(error));
      process.exitCode = 1;
    },
  );
}

export { bootstrap, configureFromArguments };
