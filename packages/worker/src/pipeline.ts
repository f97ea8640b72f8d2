// =============================================================================
// @postwatch/worker — Processing pipeline
// =============================================================================
// One cycle: fetch -> detect change -> summarize -> notify. Never throws; every
// outcome comes back as a tagged PipelineResult. The new identifier is only
// returned once the notifier has confirmed delivery, and summarize/notify are
// only reached once the identifier is known to differ from the last one.
// =============================================================================

import {
  type ContentItem,
  type ContentSource,
  type Logger,
  type Notifier,
  type PipelineError,
  type PipelineStage,
  type Summarizer,
  type Summary,
  SummarizationError,
  toStageError,
} from "@postwatch/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineDeps {
  source: ContentSource;
  summarizer: Summarizer;
  notifier: Notifier;
  recipients: readonly string[];
  logger: Logger;
}

export type PipelineResult =
  | { kind: "new-content"; newId: string; notified: true }
  | { kind: "no-change"; newId: null; notified: false }
  | {
      kind: "failed";
      stage: PipelineStage;
      error: PipelineError;
      newId: null;
      notified: false;
    };

function failed(stage: PipelineStage, err: unknown): PipelineResult {
  return {
    kind: "failed",
    stage,
    error: toStageError(stage, err),
    newId: null,
    notified: false,
  };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function runPipeline(
  deps: PipelineDeps,
  previousId: string | null,
): Promise<PipelineResult> {
  const { source, summarizer, notifier, recipients, logger } = deps;

  let item: ContentItem;
  try {
    item = await source.fetchLatest();
  } catch (err) {
    return failed("fetch", err);
  }

  if (previousId !== null && item.identifier === previousId) {
    logger.debug("No new content", { identifier: item.identifier });
    return { kind: "no-change", newId: null, notified: false };
  }

  logger.info("New content detected", {
    identifier: item.identifier,
    previousId,
  });

  let summary: Summary;
  try {
    summary = await summarizer.summarize(item.body);
    if (summary.text.trim().length === 0) {
      throw new SummarizationError("Summarizer returned empty text");
    }
  } catch (err) {
    return failed("summarize", err);
  }

  try {
    await notifier.send({ sourceId: item.identifier, summary }, recipients);
  } catch (err) {
    return failed("notify", err);
  }

  return { kind: "new-content", newId: item.identifier, notified: true };
}
