#!/usr/bin/env node
import "reflect-metadata";
import { Server } from "http";
import { container } from "tsyringe";
import { createApiServer, startApiServer } from "./api-server";
import { ICacheStore } from "./adapters/cache/cache-store.interface";
import { IDecisionLog } from "./adapters/persistence/decision-log.interface";
import { AppConfig, ConfigurationError, loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ICsvProcessor } from "./services/csv-processor.interface";
import { IInstallationVerifier } from "./services/installation-verifier.interface";
import { ILogisticsAgent } from "./services/logistics-agent.interface";
import { INotificationService } from "./services/notification.interface";
import { RotatingLogFile } from "./utils/log-file";
import { createLogger, errorMessage, setLogFile, setLogLevel } from "./utils/logger";

const logger = createLogger("Main");

const DEFAULT_EXPORT_LIMIT = 1000;

const USAGE = `Usage: logistics-agent [--log-file <path>] <command>

Commands:
  run                                   Start the agent (default)
  init-db                               Create the PostgreSQL schema
  verify                                Check configuration, APIs, Redis and PostgreSQL
  export-decisions <file.csv> [limit]   Write the decision log to CSV`;

async function run(config: AppConfig): Promise<number> {
  const cache = container.resolve<ICacheStore>("ICacheStore");
  const decisionLog = container.resolve<IDecisionLog>("IDecisionLog");
  const agent = container.resolve<ILogisticsAgent>("ILogisticsAgent");

  await cache.connect();
  if (config.database) {
    await decisionLog.initialize();
  }

  let server: Server | undefined;
  if (config.apiPort !== undefined) {
    const notifications = container.resolve<INotificationService>("INotificationService");
    server = await startApiServer(createApiServer(agent, decisionLog, notifications), config.apiPort);
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping after the current cycle`);
    agent.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  try {
    await agent.start();
  } finally {
    if (server) {
      const running = server;
      await new Promise<void>(resolve => running.close(() => resolve()));
    }
    await cache.close();
    await decisionLog.close();
  }
  return 0;
}

async function initDb(config: AppConfig): Promise<number> {
  if (!config.database) {
    logger.error("init-db requires DB_HOST to be set");
    return 1;
  }
  const decisionLog = container.resolve<IDecisionLog>("IDecisionLog");
  try {
    await decisionLog.initialize();
  } finally {
    await decisionLog.close();
  }
  return 0;
}

async function verify(): Promise<number> {
  const verifier = container.resolve<IInstallationVerifier>("IInstallationVerifier");
  const report = await verifier.verify();

  for (const check of report.checks) {
    console.log(`${check.ok ? "PASS" : "FAIL"}  ${check.name.padEnd(14)} ${check.message}`);
  }
  console.log(report.ok ? "\nAll checks passed" : "\nSome checks failed");

  await container.resolve<ICacheStore>("ICacheStore").close();
  await container.resolve<IDecisionLog>("IDecisionLog").close();
  return report.ok ? 0 : 1;
}

async function exportDecisions(args: string[]): Promise<number> {
  const [outputPath, rawLimit] = args;
  const limit = rawLimit === undefined ? DEFAULT_EXPORT_LIMIT : Number(rawLimit);
  if (!outputPath || !Number.isInteger(limit) || limit < 1) {
    console.error(USAGE);
    return 1;
  }

  const decisionLog = container.resolve<IDecisionLog>("IDecisionLog");
  const csvProcessor = container.resolve<ICsvProcessor>("ICsvProcessor");
  try {
    const decisions = await decisionLog.listDecisions(limit);
    await csvProcessor.writeDecisionReport(outputPath, decisions);
    console.log(`Wrote ${decisions.length} decisions to ${outputPath}`);
  } finally {
    await decisionLog.close();
  }
  return 0;
}

// Removes "--log-file <path>" or "--log-file=<path>" from the arguments
function takeLogFile(argv: string[]): { logFile?: string; rest: string[] } {
  const rest: string[] = [];
  let logFile: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--log-file") {
      logFile = argv[++i];
    } else if (arg.startsWith("--log-file=")) {
      logFile = arg.slice("--log-file=".length);
    } else {
      rest.push(arg);
    }
  }
  return { logFile, rest };
}

async function main(argv: string[]): Promise<number> {
  const { logFile, rest } = takeLogFile(argv);
  const [command = "run", ...args] = rest;
  if (command === "help" || command === "--help" || command === "-h") {
    console.log(USAGE);
    return 0;
  }
  if (!["run", "init-db", "verify", "export-decisions"].includes(command)) {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const logPath = logFile ?? config.logFile;
  if (logPath) {
    setLogFile(new RotatingLogFile(logPath));
  }
  await setupDI(config);

  switch (command) {
    case "init-db":
      return initDb(config);
    case "verify":
      return verify();
    case "export-decisions":
      return exportDecisions(args);
    default:
      return run(config);
  }
}

main(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(error => {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
    } else {
      logger.critical(`Fatal error: ${errorMessage(error)}`);
    }
    process.exit(1);
  });
