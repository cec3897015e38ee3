import { config as loadEnv } from "dotenv";
import { createInterface } from "node:readline/promises";

loadEnv();

import { createLogger } from "@bond-mc/logger";

import { loadCliConfig, type CliConfig } from "./config.js";
import { runCli } from "./run.js";

const main = async (): Promise<void> => {
  let config: CliConfig;
  try {
    config = loadCliConfig();
  } catch (error) {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger("apps/cli", { level: config.logLevel });
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const status = await runCli(
      {
        ask: (question) => rl.question(question),
        out: (line) => process.stdout.write(`${line}\n`),
        err: (line) => process.stderr.write(`${line}\n`),
      },
      { logger, shockStdDev: config.shockStdDev },
    );
    process.exitCode = status;
  } finally {
    rl.close();
  }
};

void main();
