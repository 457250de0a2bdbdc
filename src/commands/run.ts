import path from "path";
import { RunConfigInput, loadRunConfig } from "../config/runConfig";
import { HttpClient } from "../fetch/httpClient";
import { HttpImageDownloader, ImageDownloader } from "../fetch/imageDownloader";
import { HttpPageFetcher, PageFetcher } from "../fetch/pageFetcher";
import { buildRunReport, writeRunReport } from "../io/runReport";
import { readUrlList } from "../io/urlList";
import { Logger } from "../pipeline/processUrl";
import { BatchResult, batchSucceeded, runBatch } from "../pipeline/runBatch";
import { pathExists } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface RunCommandDeps {
  fetcher?: PageFetcher;
  downloader?: ImageDownloader;
  logger?: Logger;
}

export interface RunCommandResult {
  result: BatchResult;
  exitCode: number;
}

export async function runCommand(input: RunConfigInput, deps: RunCommandDeps = {}): Promise<RunCommandResult> {
  const config = loadRunConfig(input);
  const logger = deps.logger ?? console;
  const urlListPath = path.resolve(config.urlListPath);
  if (!(await pathExists(urlListPath))) {
    throw new Error(`File not found: ${urlListPath}`);
  }

  const client = new HttpClient({
    userAgent: config.userAgent,
    delayMs: config.delayMs,
    timeoutMs: config.timeoutMs
  });
  const outputDir = path.resolve(config.outputDir);
  const imageDir = path.resolve(config.imageDir);

  const urls = await readUrlList(urlListPath);
  logger.log(`Found ${urls.length} URLs to process`);

  const startedAt = nowUtcIsoSeconds();
  const result = await runBatch(urls, {
    fetcher: deps.fetcher ?? new HttpPageFetcher(client),
    downloader: deps.downloader ?? new HttpImageDownloader(client),
    outputDir,
    imageDir,
    logger
  });

  const done = result.outcomes.filter((outcome) => outcome.status === "done").length;
  const failed = result.outcomes.filter((outcome) => outcome.status === "failed").length;
  if (result.abortedBy) {
    logger.error(`Run stopped at ${result.abortedBy.url}; ${result.skipped.length} URLs not processed.`);
  }
  logger.log(`Processed ${done} of ${urls.length} URLs (${failed} failed).`);

  if (config.reportPath) {
    const reportPath = path.resolve(config.reportPath);
    const report = buildRunReport({
      urlListPath,
      outputDir,
      imageDir,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      result
    });
    await writeRunReport(reportPath, report);
    logger.log(`Wrote run report to ${reportPath}`);
  }

  return { result, exitCode: batchSucceeded(result) ? 0 : 1 };
}
