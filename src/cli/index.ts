#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCommand } from "../commands/run";

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
  return process.env.CARD_SCRAPER_ENV_FILE ?? fallback;
}

interface RunCliOptions {
  out: string;
  images: string;
  delay: number;
  timeout: number;
  userAgent?: string;
  report?: string;
}

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("card-scraper")
  .description("Scrape card detail pages into typed card modules and images")
  .version(pkg.version);

program.option("--env-file <path>", "Path to .env file (overrides CARD_SCRAPER_ENV_FILE)", envPath);

program
  .command("run")
  .argument("<url-list-file>", "Text file with one card page URL per line")
  .option("--out <dir>", "Directory for card modules", "./output")
  .option("--images <dir>", "Directory for card images", "./image")
  .option("--delay <ms>", "Minimum delay between requests", parseInteger, 1000)
  .option("--timeout <ms>", "Request timeout", parseInteger, 30000)
  .option("--user-agent <ua>", "User-Agent header (overrides CARD_SCRAPER_USER_AGENT)")
  .option("--report <path>", "Write a JSON run report to this path")
  .action(async (urlListPath: string, opts: RunCliOptions) => {
    const { exitCode } = await runCommand({
      urlListPath,
      outputDir: opts.out,
      imageDir: opts.images,
      delayMs: opts.delay,
      timeoutMs: opts.timeout,
      userAgent: opts.userAgent,
      reportPath: opts.report
    });
    process.exitCode = exitCode;
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
