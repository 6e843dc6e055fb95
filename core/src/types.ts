// --- tracks ---

/** One subtitle line. Times are integer milliseconds, start <= end. */
export interface SubtitleEntry {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly style?: string;    // key into the track's style table
}

/** Style metadata is carried through untouched. */
export type StyleTable = Readonly<Record<string, unknown>>;

export interface Track {
  entries: readonly SubtitleEntry[];
  styles?: StyleTable;
}

export type TrackRole = 'primary' | 'secondary';

// --- tokens ---

export interface Token {
  readonly text: string;
  readonly start: number;       // offset into the source line
  readonly end: number;         // exclusive
  readonly breakAfter: boolean; // an explicit line break followed this token
  readonly entryIndex: number;  // sourceIndex of the owning entry
}

/** Half-open [start, end) range into a flat token sequence. */
export interface TokenSpan {
  readonly start: number;
  readonly end: number;
}

export interface TokenizedEntry {
  readonly entry: SubtitleEntry;
  readonly sourceIndex: number; // position in the caller's track
  readonly tokens: readonly Token[];
}

// --- merged output ---

export type FieldOrigin = 'aligned' | 'primary-only' | 'secondary-only' | 'extended';

export interface MergedField {
  start: number;
  end: number;
  primaryText: string;
  secondaryText: string;
  primaryStyle?: string;
  secondaryStyle?: string;
  score: number;              // entry-level similarity, 0 when nothing was paired
  origin: FieldOrigin;
  sourceIndex: number;        // primary index, or secondary index for secondary-only
}

// --- collaborators ---

export interface EmbeddingProvider {
  /** Returns one vector per input text, all of the same dimension. */
  embed(texts: string[]): Promise<number[][]>;
}

export interface LanguageDetector {
  detect(text: string): string | null | Promise<string | null>;
}

// --- run control ---

export type AlignmentMode = 'synced' | 'mixed' | 'cuts';

export type StageId =
  | 'extractNonOverlap'
  | 'dtwAlign'
  | 'refineWide'
  | 'extractExtended'
  | 'refineNarrow'
  | 'combine'
  | 'cleanup';

export type AlignStage = 'init' | StageId | 'done';

export interface ProgressEvent {
  stage: AlignStage;
  percent: number;            // cumulative, 0..100, never decreasing
  message: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

/** Reports the completed fraction (0..1) of one stage's work. */
export type LocalProgress = (fraction: number) => void;

export interface AlignInput {
  primary: Track;
  secondary: Track;
}

export interface AlignOptions {
  mode?: AlignmentMode;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface AlignStats {
  mode: AlignmentMode;
  primaryLanguage: string | null;
  secondaryLanguage: string | null;
  primaryTokens: number;
  secondaryTokens: number;
  fieldsByOrigin: Record<FieldOrigin, number>;
}

export interface AlignResult {
  fields: MergedField[];
  primaryStyles: StyleTable;
  secondaryStyles: StyleTable;
  stats: AlignStats;
}
