// @postwatch/worker — polling loop and processing pipeline
import {
  type Config,
  type Logger,
  createSubstackSource,
  createGeminiSummarizer,
  createPostmarkNotifier,
  createFileMarkerStore,
  createMemoryMarkerStore,
} from "@postwatch/shared";
import { WorkerOrchestrator } from "./orchestrator.js";

export * from "./pipeline.js";
export * from "./orchestrator.js";
export * from "./sleep.js";

/**
 * Wire the orchestrator to the real source, Gemini and Postmark clients.
 */
export function createWorker(config: Config, logger: Logger): WorkerOrchestrator {
  const clientLogger = logger.child({ component: "clients" });
  const timeoutMs = config.REQUEST_TIMEOUT_MS;

  return new WorkerOrchestrator({
    pipeline: {
      source: createSubstackSource({
        url: config.SOURCE_URL,
        linkSelector: config.SOURCE_LINK_SELECTOR,
        bodySelector: config.SOURCE_BODY_SELECTOR,
        timeoutMs,
        logger: clientLogger,
      }),
      summarizer: createGeminiSummarizer({
        apiKey: config.GEMINI_API_KEY,
        model: config.GEMINI_MODEL,
        timeoutMs,
        logger: clientLogger,
      }),
      notifier: createPostmarkNotifier({
        serverToken: config.POSTMARK_API_TOKEN,
        sender: config.EMAIL_SENDER,
        subject: config.EMAIL_SUBJECT,
        messageStream: config.POSTMARK_MESSAGE_STREAM,
        timeoutMs,
        logger: clientLogger,
      }),
      recipients: config.EMAIL_RECEIVERS,
      logger: logger.child({ component: "pipeline" }),
    },
    markerStore: config.STATE_FILE
      ? createFileMarkerStore(config.STATE_FILE)
      : createMemoryMarkerStore(),
    intervalMs: config.CHECK_INTERVAL * 1000,
    logger,
  });
}
