// =============================================================================
// @postwatch/shared — Domain types and collaborator interfaces
// =============================================================================
// The worker talks to the outside world only through the interfaces below.
// Concrete clients live in source/, summarizer/, notifier/ and state/.
// =============================================================================

// ---------------------------------------------------------------------------
// Values passed through one cycle
// ---------------------------------------------------------------------------

/** The newest item published by the monitored source */
export interface ContentItem {
  /** Canonical absolute URL (or ID) of the item */
  identifier: string;
  /** Plain body text, paragraphs separated by newlines */
  body: string;
}

export interface Summary {
  text: string;
}

/** What the notifier delivers: a summary plus the item it was made from */
export interface Digest {
  sourceId: string;
  summary: Summary;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Fails with FetchError */
export interface ContentSource {
  fetchLatest(): Promise<ContentItem>;
}

/** Fails with SummarizationError */
export interface Summarizer {
  summarize(text: string): Promise<Summary>;
}

/** Resolves only once delivery is confirmed. Fails with DeliveryError. */
export interface Notifier {
  send(digest: Digest, recipients: readonly string[]): Promise<void>;
}

/**
 * Durable home of the last-seen marker. `load` resolves null when nothing
 * has been recorded yet.
 */
export interface MarkerStore {
  load(): Promise<string | null>;
  save(identifier: string): Promise<void>;
}
