import { BatchResult } from "../pipeline/runBatch";
import { UrlOutcome } from "../pipeline/processUrl";
import { RunReport, RunReportUrl } from "../types/runReport";
import { writeJson } from "../utils/fs";

export interface RunReportParams {
  urlListPath: string;
  outputDir: string;
  imageDir: string;
  startedAt: string;
  endedAt: string;
  result: BatchResult;
}

function reportEntry(outcome: UrlOutcome): RunReportUrl {
  switch (outcome.status) {
    case "done":
      return {
        url: outcome.url,
        status: "done",
        card_type: outcome.cardType,
        output_path: outcome.outputPath,
        image: outcome.image,
        error: null
      };
    case "failed":
      return {
        url: outcome.url,
        status: "failed",
        card_type: outcome.cardType,
        output_path: outcome.outputPath,
        image: null,
        error: { state: outcome.failedIn, message: outcome.message }
      };
    case "aborted":
      return {
        url: outcome.url,
        status: "aborted",
        card_type: null,
        output_path: null,
        image: null,
        error: { state: "classifying", message: outcome.error.message }
      };
  }
}

export function buildRunReport(params: RunReportParams): RunReport {
  const skipped: RunReportUrl[] = params.result.skipped.map((url) => ({
    url,
    status: "skipped",
    card_type: null,
    output_path: null,
    image: null,
    error: null
  }));
  return {
    schema_version: "1.0",
    url_list_path: params.urlListPath,
    output_dir: params.outputDir,
    image_dir: params.imageDir,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    aborted: params.result.abortedBy !== null,
    urls: [...params.result.outcomes.map(reportEntry), ...skipped]
  };
}

export async function writeRunReport(filePath: string, report: RunReport): Promise<void> {
  await writeJson(filePath, report);
}
