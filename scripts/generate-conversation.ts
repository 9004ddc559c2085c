#!/usr/bin/env node
import path from "node:path";
import { parseRunConfig, type RunConfigInput } from "../src/config.js";
import { exportJsonl, exportTranscript, writeRunSummary } from "../src/export/exporters.js";
import { createConsoleLogger, silentLogger } from "../src/infra/logger.js";
import { runSimulation } from "../src/orchestrator/simulation.js";

type CliOptions = RunConfigInput & {
  verbose: boolean;
};

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { verbose: false, enhancement: {} };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--seed" && next) {
      opts.seed = next;
      i += 1;
      continue;
    }
    if (arg === "--start" && next) {
      opts.startDate = next;
      i += 1;
      continue;
    }
    if (arg === "--weeks" && next) {
      opts.weeks = next;
      i += 1;
      continue;
    }
    if (arg === "--tz" && next) {
      opts.timeZone = next;
      i += 1;
      continue;
    }
    if (arg === "--output-dir" && next) {
      opts.outputDir = next;
      i += 1;
      continue;
    }
    if (arg === "--enhance" && next) {
      opts.enhancement = { ...opts.enhancement, mode: next };
      i += 1;
      continue;
    }
    if (arg === "--model" && next) {
      opts.enhancement = { ...opts.enhancement, model: next };
      i += 1;
      continue;
    }
    if (arg === "--host" && next) {
      opts.enhancement = { ...opts.enhancement, host: next };
      i += 1;
      continue;
    }
    if (arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    throw new Error(`Unknown or incomplete argument: ${arg}`);
  }
  return opts;
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  const config = parseRunConfig(opts);
  const logger = opts.verbose ? createConsoleLogger() : silentLogger;

  const result = await runSimulation(config, { logger });

  const jsonlFile = await exportJsonl(result.messages, path.join(config.outputDir, "conversation.jsonl"));
  const transcriptFile = await exportTranscript(result.messages, path.join(config.outputDir, "conversation.txt"));
  const summaryFile = await writeRunSummary(result.summary, path.join(config.outputDir, "run-summary.json"));

  console.log("Conversation generated.");
  console.log(`seed=${config.seed}`);
  console.log(`weeks=${config.weeks}`);
  console.log(`messages=${result.messages.length}`);
  console.log(`member_initiated_per_week=${result.summary.tally.memberInitiatedPerWeek.toFixed(2)}`);
  console.log(`enhancement=${result.summary.enhancementMode}`);
  console.log(`jsonl=${jsonlFile}`);
  console.log(`transcript=${transcriptFile}`);
  console.log(`summary=${summaryFile}`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
