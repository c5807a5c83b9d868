/**
 * Type definitions for the augments artifact store and processing pipeline.
 *
 * Pure data only: no I/O, no classes with behaviour.
 * Higher layers import these types; this module imports nothing.
 */

// ============================================================================
// ARTIFACTS
// ============================================================================

/** Categories of artifacts. Each maps to one directory under the artifacts root. */
export type ArtifactCategory = 'transcript' | 'audio' | 'download' | 'temp' | 'markdown-report'

export const ARTIFACT_CATEGORIES: readonly ArtifactCategory[] = [
  'transcript',
  'audio',
  'download',
  'temp',
  'markdown-report',
] as const

/**
 * On-disk directory for each category. These names are shared with existing
 * installations and must not change.
 */
export const CATEGORY_DIRECTORIES: Record<ArtifactCategory, string> = {
  transcript: 'transcripts',
  audio: 'audio',
  download: 'downloads',
  temp: 'temp',
  'markdown-report': 'reports',
}

/** File types a category writes, for directories it shares with other files. */
export const CATEGORY_EXTENSIONS: Partial<Record<ArtifactCategory, readonly string[]>> = {
  'markdown-report': ['.md'],
}

/**
 * A named, typed file on disk.
 *
 * @property name - Sanitised file name including extension, unique within the category
 * @property path - Absolute path of the committed file
 * @property createdAt - Commit time (artifacts are never modified in place)
 * @property checksum - sha256 hex; present when the store computed it during save
 */
export interface Artifact {
  category: ArtifactCategory
  name: string
  path: string
  createdAt: Date
  size: number
  checksum?: string
}

// ============================================================================
// CACHE
// ============================================================================

/** One row of the cache index: a source key pointing at an artifact the store owns. */
export interface CacheEntry {
  key: string
  category: ArtifactCategory
  name: string
  path: string
  /** ISO timestamp of the put. */
  cachedAt: string
  meta?: Record<string, string>
}

// ============================================================================
// SOURCES
// ============================================================================

export type TranscriptFormat = 'vtt' | 'srt' | 'txt'

export const TRANSCRIPT_FORMATS: readonly TranscriptFormat[] = ['vtt', 'srt', 'txt'] as const

/** Parsed source reference handed to the acquisition stage. */
export type SourceRef =
  | { kind: 'video'; videoId: string; url: string }
  | { kind: 'clipboard'; title?: string }

/** What a caller hands the pipeline: a parsed reference, or raw input that acquisition parses. */
export type PipelineSource = SourceRef | { kind: 'input'; input: string; title?: string }

/** Subset of yt-dlp's info JSON that the pipeline uses. */
export interface VideoMetadata {
  id: string
  title: string
  author: string
  /** Seconds. */
  duration: number
  viewCount: number
  /** yt-dlp's YYYYMMDD form. */
  uploadDate: string
  description: string
  url: string
}

/** Output of the acquisition stage. */
export interface AcquiredSource {
  ref: SourceRef
  /** Normalised plain text fed to analysis. */
  text: string
  title: string
  metadata?: VideoMetadata
  /** Raw transcript artifact, when one was persisted or found in cache. */
  artifact?: Artifact
  fromCache: boolean
}

// ============================================================================
// ANALYSIS
// ============================================================================

export type PatternName = 'summarize' | 'extract-insights' | 'extract-links'

export const PATTERN_NAMES: readonly PatternName[] = ['summarize', 'extract-insights', 'extract-links'] as const

/** Extra context some patterns interpolate into their prompt. */
export interface AnalysisContext {
  title?: string
  sourceUrl?: string
  description?: string
}

export interface PatternOutput {
  pattern: PatternName
  content: string
}

/** One top-level frontmatter key with its raw YAML lines (continuations included). */
export interface FrontmatterField {
  key: string
  lines: string[]
}

// ============================================================================
// SYNTHESIS
// ============================================================================

export interface SynthesisAttempt {
  provider: string
  ok: boolean
  error?: string
}

export interface SynthesisResult {
  artifact: Artifact
  /** Name of the provider that produced the audio. */
  provider: string
  attempts: SynthesisAttempt[]
  fromCache: boolean
}

// ============================================================================
// PIPELINE
// ============================================================================

/** Orchestrator states. `done` and `errored` are terminal. */
export type PipelineState =
  | 'idle'
  | 'acquiring'
  | 'analyzing'
  | 'synthesizing'
  | 'assembling'
  | 'done'
  | 'errored'

/** Stages that do work. Each one maps to the working state of the same name. */
export enum PipelineStage {
  Acquisition = 'acquisition',
  Analysis = 'analysis',
  Synthesis = 'synthesis',
  Assembly = 'assembly',
}

/**
 * Per-stage outcome record.
 *
 * @property duration - Wall-clock time in milliseconds
 */
export interface StageResult {
  stage: PipelineStage
  success: boolean
  skipped?: boolean
  error?: string
  duration: number
}

export type PipelineEventStatus = 'started' | 'succeeded' | 'failed' | 'skipped'

/** Plain status event for whatever displays progress. */
export interface PipelineEvent {
  stage: PipelineStage
  status: PipelineEventStatus
  message: string
}

/** A request to run the pipeline once. */
export interface PipelineRequest {
  source: PipelineSource
  patterns: PatternName[]
  format: TranscriptFormat
  audio: boolean
  /** When false, nothing but scratch audio is persisted and the report is only returned. */
  save: boolean
  useCache: boolean
  /** Ask the analysis model for extra frontmatter (content type, skill level, topics, reading time). */
  enrichFrontmatter?: boolean
  /** Give the extracted insights a second editing pass. */
  refineInsights?: boolean
}

export interface PipelineReport {
  markdown: string
  /** Undefined when the run did not save. */
  artifact?: Artifact
  fromCache: boolean
}

export interface PipelineResult {
  state: 'done' | 'errored'
  /** Stage that failed, when `state` is `errored`. */
  failedStage?: PipelineStage
  error?: Error
  source?: AcquiredSource
  outputs: PatternOutput[]
  synthesis?: SynthesisResult
  report?: PipelineReport
  /** Every artifact this run persisted or reused, in order. */
  artifacts: Artifact[]
  stageResults: StageResult[]
  totalDuration: number
}
