import { parseArgs } from "node:util";
import process from "node:process";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { createImpactEngine } from "@ecoscore/impact-core";
import { errorMessage } from "@ecoscore/shared";
import { configFromEnv, DEFAULT_CONFIG_FILE, loadConfig, resolveConfig } from "../../config/config.js";
import { createLogger, LOG_LEVELS } from "../../logging/logger.js";
import { buildServer } from "../../server/server.js";
import { extractVerbosity, parsePortFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      port: { type: "string" },
      host: { type: "string" },
      "log-level": { type: "string" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return undefined;
  }

  const logLevelFlag = values["log-level"];
  const logLevel = LOG_LEVELS.find((l) => l === logLevelFlag);
  if (logLevelFlag !== undefined && logLevel === undefined) {
    throw new Error(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
  }

  loadDotenv();

  // an explicit --config must exist, the default file is optional
  const configPath = values.config ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  const file = await loadConfig(configPath, { optional: values.config === undefined });

  const config = resolveConfig({
    cli: {
      host: values.host,
      port: parsePortFromCommand("--port", values.port),
      logLevel: verbosity >= 2 ? "debug" : logLevel,
    },
    file,
    env: configFromEnv(),
  });

  const logger = createLogger({ level: config.logLevel });

  if (config.usingDevApiKey) {
    logger.warn("no API key configured (ECOSCORE_API_KEYS or apiKeys in config), accepting the development key only");
  }
  if (verbosity >= 1) {
    logger.info({ configFile: file ? configPath : null, sources: config.sources, rateLimit: config.rateLimit }, "configuration resolved");
  }

  const engine = createImpactEngine({ logger });
  const app = await buildServer({
    engine,
    logger,
    apiKeys: config.apiKeys,
    rateLimit: config.rateLimit,
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, "gracefully shutting down");
    await app.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, `error closing HTTP server: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.port, host: config.host });
  return app;
}
