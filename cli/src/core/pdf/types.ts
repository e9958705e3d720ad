/**
 * Types for blank-page detection, chunk splitting and batch runs.
 */

// ── Page measurement ─────────────────────────────────────────

/** Text-derived attributes of a page. */
export interface TextMetrics {
  /** Length of the extracted text, surrounding whitespace trimmed. */
  textLength: number;
  /** Characters matching the alphanumeric class (incl. German umlauts). */
  alnumCount: number;
  /** alnumCount / max(1, textLength). */
  alnumRatio: number;
}

/** Everything the classifier looks at for one page. */
export interface PageMetrics extends TextMetrics {
  /** Zero-based page index within its document. */
  pageIndex: number;
  /** Decoded byte length of the page's content streams. */
  contentBytes: number;
  /** True if the page (or a nested form) references an image XObject. */
  hasImage: boolean;
}

/** Extracts one text string per page, in page order. */
export type TextExtractor = (bytes: Uint8Array) => Promise<string[]>;

// ── Classification ───────────────────────────────────────────

export interface BlankPageConfig {
  /** Blank-eligible only if alnumCount < minAlnum. */
  readonly minAlnum: number;
  /** Blank-eligible only if alnumRatio < minAlnumRatio. */
  readonly minAlnumRatio: number;
  /** Blank-eligible only if contentBytes < minBytes. */
  readonly minBytes: number;
  /** Pages with an image are never blank. */
  readonly imageNonblank: boolean;
  /** Blank-eligible only if textLength <= textLengthThreshold. */
  readonly textLengthThreshold: number;
}

/**
 * Why a page was kept, or `below-thresholds` when every criterion
 * pointed to blank.
 */
export type DecisionReason =
  | 'image'
  | 'text-length'
  | 'alnum-count'
  | 'alnum-ratio'
  | 'content-bytes'
  | 'below-thresholds';

export interface PageDecision {
  blank: boolean;
  reason: DecisionReason;
}

// ── Policies ─────────────────────────────────────────────────

/** Cleaner output when every page of a document is blank. */
export type FallbackPolicy = 'emit-original' | 'emit-empty';

/** What to do when the archive already holds a file of the same name. */
export type CollisionPolicy = 'timestamp-suffix' | 'overwrite';

// ── Split ────────────────────────────────────────────────────

/** Half-open page range [start, end), zero-based. */
export interface PageRange {
  start: number;
  end: number;
}

/** A chunk produced from a source PDF. */
export interface PdfChunk {
  /** 1-based chunk index. */
  index: number;
  /** Total number of chunks for the source document. */
  total: number;
  /** Zero-based indices of the source pages in this chunk. */
  pageIndices: number[];
  bytes: Uint8Array;
  /** True when splitting was disabled and the bytes are the source itself. */
  passThrough: boolean;
}

/** A chunk written to disk. */
export interface SplitFile {
  index: number;
  pageCount: number;
  path: string;
  fileName: string;
}

// ── Clean ────────────────────────────────────────────────────

export type CleanOutcome = 'filtered' | 'original' | 'empty';

export interface CleanPlan {
  /** Zero-based indices of the pages to keep, in order. */
  keep: number[];
  /** Pages classified blank. */
  removed: number;
  outcome: CleanOutcome;
  decisions: PageDecision[];
}

export interface CleanOptions {
  blank: BlankPageConfig;
  fallback: FallbackPolicy;
  /** Emit one debug record per page. */
  debugPages?: boolean;
  /** Name used in log records (defaults to "document"). */
  label?: string;
}

export interface CleanResult {
  bytes: Uint8Array;
  outcome: CleanOutcome;
  /** Pages in the output document. */
  kept: number;
  /** Pages dropped from the output; 0 when the original was kept. */
  removed: number;
  metrics: PageMetrics[];
  decisions: PageDecision[];
}

export interface CleanedFile {
  source: string;
  path: string;
  outcome: CleanOutcome;
  kept: number;
  removed: number;
}

// ── Batch ────────────────────────────────────────────────────

export interface BatchConfig {
  readonly inDir: string;
  readonly splitDir: string;
  /** Absent when cleaning is disabled. */
  readonly cleanDir?: string;
  /** Chunk size; <= 0 disables splitting. */
  readonly every: number;
  readonly archiveDir?: string;
  readonly blank: BlankPageConfig;
  readonly fallback: FallbackPolicy;
  readonly collision: CollisionPolicy;
  readonly debugPages: boolean;
}

export type DocumentStatus = 'processed' | 'skipped' | 'failed';

export interface DocumentReport {
  file: string;
  status: DocumentStatus;
  pageCount?: number;
  chunks: SplitFile[];
  cleaned: CleanedFile[];
  archivedTo?: string;
  error?: string;
}

export interface BatchSummary {
  documents: DocumentReport[];
  totals: {
    documents: number;
    processed: number;
    skipped: number;
    failed: number;
    chunks: number;
    cleaned: number;
    pagesKept: number;
    pagesRemoved: number;
  };
}
