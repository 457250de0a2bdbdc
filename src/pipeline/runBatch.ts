import { ClassificationError } from "../errors";
import { ensureDir } from "../utils/fs";
import { PipelineContext, UrlOutcome, processUrl } from "./processUrl";

export interface BatchResult {
  outcomes: UrlOutcome[];
  /** Set when an unclassifiable page stopped the run. */
  abortedBy: ClassificationError | null;
  /** URLs never started because the run stopped first. */
  skipped: string[];
}

export function batchSucceeded(result: BatchResult): boolean {
  return result.abortedBy === null && result.outcomes.every((outcome) => outcome.status === "done");
}

/**
 * Processes URLs strictly one after another in list order. Each URL's files are on disk before
 * the next URL starts; nothing already written is removed when the run stops early.
 */
export async function runBatch(urls: readonly string[], context: PipelineContext): Promise<BatchResult> {
  await ensureDir(context.outputDir);
  await ensureDir(context.imageDir);

  const outcomes: UrlOutcome[] = [];
  for (const [index, url] of urls.entries()) {
    const outcome = await processUrl(url, context);
    outcomes.push(outcome);
    if (outcome.status === "aborted") {
      return { outcomes, abortedBy: outcome.error, skipped: urls.slice(index + 1) };
    }
  }
  return { outcomes, abortedBy: null, skipped: [] };
}
