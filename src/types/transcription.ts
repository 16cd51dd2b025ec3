/**
 * Transcription job data model
 */

export interface MediaFile {
  path: string;
  byteSize: number;
  /** Filled by the prober; absent until then */
  durationSeconds?: number;
}

export interface ChunkSpec {
  /** 0-based position in the planned chunk sequence */
  readonly index: number;
  readonly filePath: string;
  /** Seconds from the start of the full recording */
  readonly startOffset: number;
  readonly plannedDuration: number;
  readonly byteSize: number;
}

export interface Segment {
  id: number;
  start: number;
  end: number;
  text: string;
}

/** Segment as returned by the transcription service, times relative to the chunk */
export interface RawSegment {
  id?: number;
  start: number;
  end: number;
  text: string;
}

export interface RawTranscription {
  text: string;
  durationSeconds?: number;
  segments: RawSegment[];
}

export type TranscriptionErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'server_error'
  | 'invalid_input'
  | 'auth_error'
  | 'cancelled'
  | 'unknown';

export interface ChunkSuccess {
  status: 'success';
  index: number;
  text: string;
  segments: RawSegment[];
  wordCount: number;
  attempts: number;
  durationSeconds?: number;
}

export interface ChunkFailure {
  status: 'failure';
  index: number;
  kind: TranscriptionErrorKind;
  message: string;
  attempts: number;
}

export type ChunkOutcome = ChunkSuccess | ChunkFailure;

export type TranscriptionMethod = 'single' | 'parallel';

export interface ChunkDetail {
  index: number;
  words?: number;
  durationSeconds?: number;
  error?: string;
}

export interface ChunkFailureSummary {
  index: number;
  kind: TranscriptionErrorKind;
  message: string;
}

export interface ChunkingStats {
  totalChunks: number;
  successfulChunks: number;
  failedChunks: number;
  method: TranscriptionMethod;
  chunkDurationMinutes: number;
  /** Indices the splitter could not extract */
  droppedChunks: number[];
  chunkDetails: ChunkDetail[];
  failures: ChunkFailureSummary[];
}

export interface TranscriptionResult {
  fullTranscript: string;
  segments: Segment[];
  durationSeconds: number;
  wordCount: number;
  audioFile: string;
  /** True when a chunk failed or was dropped while splitting */
  partial: boolean;
  chunkingStats: ChunkingStats;
}

export type JobState =
  | 'planned'
  | 'splitting'
  | 'dispatching'
  | 'merging'
  | 'cleanup'
  | 'done'
  | 'failed';

export interface ChunkStatus {
  id: number | string;
  total: number;
  status: 'pending' | 'processing' | 'completed' | 'error';
  stage?: 'splitting' | 'transcribing' | 'retrying';
  message?: string;
}

/** External speech-to-text service */
export interface TranscriptionService {
  transcribe(filePath: string, signal?: AbortSignal): Promise<RawTranscription>;
}

/** External media inspection/extraction tooling */
export interface MediaToolkit {
  /** File extension of extracted chunks, without the dot */
  readonly chunkExtension: string;
  probe(filePath: string, signal?: AbortSignal): Promise<number>;
  extractSegment(
    filePath: string,
    start: number,
    duration: number,
    outPath: string,
    signal?: AbortSignal
  ): Promise<void>;
}
