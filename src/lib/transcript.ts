// TRANSCRIPT MODEL
// Segments, full-document results and subtitle rendering

import { formatTimestamp, type SubtitleFormat } from './timestamps';

export interface WordTiming {
  word: string;
  start: number;
  end: number;
}

/**
 * One continuous span of speech attributed to a single speaker and language.
 */
export interface TranscriptSegment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly speaker?: string;
  /** 0-1 for most providers; log-probability derived values may fall outside */
  readonly confidence: number;
  readonly language: string;
  readonly words: readonly WordTiming[];
}

export interface TranscriptionResult {
  readonly segments: readonly TranscriptSegment[];
  readonly language: string;
  readonly duration: number;
  /** Full transcript text. Authoritative: never re-derived from segments */
  readonly text: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface SegmentInit {
  start: number;
  end: number;
  text: string;
  speaker?: string;
  confidence?: number;
  language?: string;
  words?: readonly WordTiming[];
}

export const DEFAULT_LANGUAGE = 'en';

export function createSegment(init: SegmentInit): TranscriptSegment {
  return Object.freeze({
    start: init.start,
    end: init.end,
    text: init.text,
    ...(init.speaker !== undefined ? { speaker: init.speaker } : {}),
    confidence: init.confidence ?? 1,
    language: init.language ?? DEFAULT_LANGUAGE,
    words: Object.freeze([...(init.words ?? [])]),
  });
}

/**
 * Map an average log-probability onto a confidence value.
 * Approximation kept for compatibility: no clamping, so -1.5 yields -0.5.
 */
export function confidenceFromLogProb(logProbability: number): number {
  return logProbability + 1;
}

/**
 * Reported duration when the provider gave one, otherwise the last segment's end
 */
export function resolveDuration(reported: number | undefined, segments: readonly TranscriptSegment[]): number {
  if (reported) {
    return reported;
  }

  const last = segments[segments.length - 1];
  return last ? last.end : 0;
}

export function joinSegmentText(segments: readonly TranscriptSegment[]): string {
  return segments.map(segment => segment.text).join(' ');
}

export function renderSubtitles(result: TranscriptionResult, format: SubtitleFormat): string {
  const cues = result.segments.map((segment, index) => {
    const start = formatTimestamp(segment.start, format);
    const end = formatTimestamp(segment.end, format);
    return `${index + 1}\n${start} --> ${end}\n${segment.text}\n\n`;
  });

  const header = format === 'vtt' ? 'WEBVTT\n\n' : '';
  return header + cues.join('');
}

export function toSrt(result: TranscriptionResult): string {
  return renderSubtitles(result, 'srt');
}

export function toVtt(result: TranscriptionResult): string {
  return renderSubtitles(result, 'vtt');
}

export function toPlainText(result: TranscriptionResult): string {
  return result.text;
}

// =============================================================================
// WIRE FORMAT
// =============================================================================

export interface SerializedSegment {
  start: number;
  end: number;
  text: string;
  speaker: string | null;
  confidence: number;
  language: string;
  words: WordTiming[];
}

export interface SerializedTranscription {
  segments: SerializedSegment[];
  language: string;
  duration: number;
  text: string;
  metadata: Record<string, unknown>;
}

export function serializeSegment(segment: TranscriptSegment): SerializedSegment {
  return {
    start: segment.start,
    end: segment.end,
    text: segment.text,
    speaker: segment.speaker ?? null,
    confidence: segment.confidence,
    language: segment.language,
    words: segment.words.map(word => ({ ...word })),
  };
}

export function serializeTranscription(result: TranscriptionResult): SerializedTranscription {
  return {
    segments: result.segments.map(serializeSegment),
    language: result.language,
    duration: result.duration,
    text: result.text,
    metadata: { ...result.metadata },
  };
}
