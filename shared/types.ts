export const NOT_AVAILABLE = 'N/A';

export type NotAvailable = typeof NOT_AVAILABLE;

/** One successfully scraped page. Every field carries a value or its sentinel. */
export interface Article {
  url: string;
  title: string;
  subtitle: string;
  text: string;
  keywords: string[];
  authorName: string;
  authorUrl: string;
  claps: number;
  readingTimeMinutes: number | NotAvailable;
  imageCount: number;
  imageUrls: string[];
  externalLinkCount: number;
}

/**
 * An article as read back from the CSV snapshot. Text cells may be empty and
 * list cells keep their serialized form.
 */
export interface SnapshotRecord {
  url: string;
  title: string;
  subtitle: string;
  text: string;
  keywords: string;
  authorName: string;
  authorUrl: string;
  claps: number;
  readingTime: string;
  imageCount: number;
  imageUrls: string;
  externalLinkCount: number;
}

export interface SearchResultRow {
  Title: string;
  URL: string;
  Claps: number;
  Relevance_Score: number;
}

export interface HealthStatus {
  status: 'ok';
  data_loaded: boolean;
  article_count: number;
}

export interface ErrorPayload {
  error: string;
  details?: unknown;
}
