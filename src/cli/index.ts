#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runCheck } from "../commands/check";
import { runInitDb } from "../commands/initDb";
import { runBuildSources } from "../commands/buildSources";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_MAX_BYTES } from "../capture/fingerprint";
import { DEFAULT_RETRY_POLICY } from "../capture/http";
import { DEFAULT_RATE_FILTER } from "../config/rateExport";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.TARIFF_WATCH_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("tariff-watch")
  .description("Tariff document change monitor (LLM-assisted selection)")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides TARIFF_WATCH_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("check")
  .description("Check every source in a source list and write a change report")
  .requiredOption("--sources <path>", "Path to the source list JSON")
  .option("--out <dir>", "Report output directory", "./reports")
  .option("--quick", "Skip the download when a HEAD probe shows the document unchanged", false)
  .option("--initialize", "Create the tracked_documents table if it does not exist", false)
  .option("--dry-run", "Use an in-memory store instead of Postgres", false)
  .option("--model <model>", "LLM model used for selection", "gpt-4o-mini")
  .option("--api-key-env <env>", "Env var with API key", "OPENAI_API_KEY")
  .option("--concurrency <n>", "Sources processed in parallel", positiveInt, 1)
  .option("--timeout-ms <ms>", "Per-attempt download timeout", positiveInt, DEFAULT_FETCH_TIMEOUT_MS)
  .option("--attempts <n>", "Download attempts per URL", positiveInt, DEFAULT_RETRY_POLICY.attempts)
  .option("--max-bytes <n>", "Largest document accepted", positiveInt, DEFAULT_MAX_BYTES)
  .option("--content-type <type...>", "Accepted Content-Type values", ["application/pdf"])
  .action(async (opts) => {
    await runCheck({
      sourcesPath: opts.sources,
      outDir: opts.out,
      quick: Boolean(opts.quick),
      initialize: Boolean(opts.initialize),
      dryRun: Boolean(opts.dryRun),
      model: opts.model,
      apiKeyEnv: opts.apiKeyEnv,
      concurrency: opts.concurrency,
      timeoutMs: opts.timeoutMs,
      attempts: opts.attempts,
      maxBytes: opts.maxBytes,
      contentTypes: opts.contentType
    });
  });

program
  .command("init-db")
  .description("Create the tracked_documents table if it does not exist")
  .action(async () => {
    await runInitDb();
  });

program
  .command("build-sources")
  .description("Derive a source list from a utility rate export")
  .requiredOption("--rates <path>", "Path to the rate export JSON")
  .option("--out <path>", "Output path for the source list. If omitted, prints to stdout.")
  .option("--sector <sector>", "Sector to keep", DEFAULT_RATE_FILTER.sector)
  .option("--country <country>", "Country to keep", DEFAULT_RATE_FILTER.country)
  .action(async (opts) => {
    await runBuildSources({
      ratesPath: opts.rates,
      outPath: opts.out,
      filter: { sector: opts.sector, country: opts.country }
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
