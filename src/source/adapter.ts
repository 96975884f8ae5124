/**
 * A provider as declared in the providers file.
 * `element` is either a plain selector / tag name or a JSON object string
 * with `container`, `title_selector` and `date_selector`.
 */
export interface ProviderSpec {
  name: string;
  url: string;
  strategy?: string;
  element?: string;
}

/**
 * Which date-discovery rule produced the date.
 * 0 none, 1 configured selector, 2 <time>, 3 attribute, 4 class name, 5 text scan.
 */
export type DateTier = 0 | 1 | 2 | 3 | 4 | 5;

export interface ExtractionResult {
  /** YYYY-MM-DD, or '' when no date was found. */
  date: string;
  title: string;
  link: string;
  tier: DateTier;
}

export interface ArticleRecord extends Readonly<ExtractionResult> {
  readonly source: string;
}

export type Extractor = (fragment: Element) => ExtractionResult;

/**
 * How to find article fragments in a fetched document.
 */
export type SearchCriteria =
  | { kind: 'selector'; selector: string }
  | { kind: 'selectors'; selectors: string[] }
  | { kind: 'classPattern'; pattern: RegExp };

export type FailureType = 'fetch_failed' | 'extraction_failed' | 'provider_failed';

export interface FailureEvent {
  source: string;
  error_type: FailureType;
  message: string;
  url: string;
  domain: string;
  metadata: Record<string, unknown>;
  traceback?: string;
}

/** Totals of one discovery cycle. */
export interface RunSummary {
  providers_total: number;
  providers_processed: number;
  providers_failed: number;
  articles_found: number;
  articles_written: number;
  duration_ms: number;
}

/**
 * Receives failure events and, where supported, one summary per cycle.
 * Implementations may throw; callers treat reporting as best-effort.
 */
export interface TelemetrySink {
  record(event: FailureEvent): void;
  recordSummary?(summary: RunSummary): void;
}
