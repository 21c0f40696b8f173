// OPENAI WHISPER PROVIDER
// Speech-to-text via /audio/transcriptions with segment and word timestamps

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { WHISPER_DEFAULTS, type WhisperConfig } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { downloadMedia, ensureFileExists, requestProviderJson } from '../lib/http';
import {
  DEFAULT_LANGUAGE,
  confidenceFromLogProb,
  createSegment,
  joinSegmentText,
  resolveDuration,
  type TranscriptSegment,
  type TranscriptionResult,
  type WordTiming,
} from '../lib/transcript';
import {
  audioContentType,
  audioExtension,
  isRecord,
  readNumber,
  readRecordArray,
  readString,
} from '../lib/utils';
import type { TranscribeOptions, TranscriptionService } from './types';

const PROVIDER = 'Whisper';

function parseWords(entries: Record<string, unknown>[]): WordTiming[] {
  return entries.map(entry => ({
    word: (readString(entry, 'word') ?? '').trim(),
    start: readNumber(entry, 'start') ?? 0,
    end: readNumber(entry, 'end') ?? 0,
  }));
}

/**
 * Word timings come back at the top level of the response; each word goes to
 * the last segment starting at or before it.
 */
function assignWords(segmentStarts: number[], words: WordTiming[]): WordTiming[][] {
  const buckets: WordTiming[][] = segmentStarts.map(() => []);
  for (const word of words) {
    let index = -1;
    for (let i = 0; i < segmentStarts.length; i++) {
      if (segmentStarts[i] <= word.start) {
        index = i;
      }
    }
    if (index >= 0) {
      buckets[index].push(word);
    }
  }
  return buckets;
}

/**
 * Map a verbose_json transcription response onto the transcript model
 */
export function parseWhisperResponse(payload: unknown, model: string): TranscriptionResult {
  const data = isRecord(payload) ? payload : {};
  const language = readString(data, 'language') ?? DEFAULT_LANGUAGE;
  const reportedDuration = readNumber(data, 'duration');
  const rawText = readString(data, 'text');
  const rawSegments = readRecordArray(data, 'segments');

  const topLevelWords = assignWords(
    rawSegments.map(seg => readNumber(seg, 'start') ?? 0),
    parseWords(readRecordArray(data, 'words'))
  );

  const segments: TranscriptSegment[] = rawSegments.map((seg, index) => {
    const ownWords = parseWords(readRecordArray(seg, 'words'));
    return createSegment({
      start: readNumber(seg, 'start') ?? 0,
      end: readNumber(seg, 'end') ?? 0,
      text: (readString(seg, 'text') ?? '').trim(),
      confidence: confidenceFromLogProb(readNumber(seg, 'avg_logprob') ?? 0),
      language,
      words: ownWords.length > 0 ? ownWords : topLevelWords[index],
    });
  });

  // No segments but a transcript: one segment spanning the whole file
  if (segments.length === 0 && rawText) {
    segments.push(createSegment({
      start: 0,
      end: reportedDuration ?? 0,
      text: rawText.trim(),
      language,
    }));
  }

  return {
    segments,
    language,
    duration: resolveDuration(reportedDuration, segments),
    text: rawText ?? joinSegmentText(segments),
    metadata: {
      model,
      task: readString(data, 'task') ?? 'transcribe',
    },
  };
}

export class WhisperTranscriptionService implements TranscriptionService {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(config: WhisperConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY not configured');
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? WHISPER_DEFAULTS.model;
    this.timeoutMs = (config.timeoutSeconds ?? WHISPER_DEFAULTS.timeoutSeconds) * 1000;
    this.baseUrl = config.baseUrl ?? WHISPER_DEFAULTS.baseUrl;
  }

  async transcribe(filePath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    await ensureFileExists(filePath);

    const fileName = path.basename(filePath);
    console.log(`Transcribing with Whisper: ${fileName}`);

    const audio = await readFile(filePath);
    return this.transcribeAudio(audio, {
      ...options,
      filename: options.filename ?? fileName,
      contentType: options.contentType ?? audioContentType(fileName),
    });
  }

  /**
   * Whisper takes no URLs, so the media is downloaded first
   */
  async transcribeUrl(url: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const response = await downloadMedia(url, this.timeoutMs);
    const contentType = options.contentType ?? response.headers.get('content-type') ?? 'audio/mpeg';
    const audio = await response.arrayBuffer();

    return this.transcribeAudio(audio, {
      ...options,
      contentType,
      filename: options.filename ?? fileNameFromUrl(url, contentType),
    });
  }

  async transcribeAudio(audio: ArrayBuffer | Uint8Array, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const contentType = options.contentType ?? 'audio/mpeg';
    const fileName = options.filename ?? `audio.${audioExtension(contentType)}`;

    const bytes = audio instanceof Uint8Array ? audio : new Uint8Array(audio);
    const formData = new FormData();
    formData.append('file', new Blob([bytes], { type: contentType }), fileName);
    formData.append('model', this.model);
    formData.append('response_format', 'verbose_json');
    formData.append('timestamp_granularities[]', 'segment');
    formData.append('timestamp_granularities[]', 'word');

    if (options.language && options.language.toLowerCase() !== 'auto') {
      formData.append('language', options.language.toLowerCase());
    }
    if (options.prompt) {
      formData.append('prompt', options.prompt);
    }

    console.log(`Whisper request: ${bytes.byteLength} bytes, language=${options.language || 'auto'}`);

    const payload = await requestProviderJson(PROVIDER, `${this.baseUrl}/audio/transcriptions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: formData,
    }, this.timeoutMs);

    const result = parseWhisperResponse(payload, this.model);
    console.log(`Whisper success: ${result.segments.length} segments, ${result.duration.toFixed(2)}s, lang=${result.language}`);
    return result;
  }
}

function fileNameFromUrl(url: string, contentType: string): string {
  const name = path.posix.basename(new URL(url).pathname);
  if (name.includes('.')) {
    return name;
  }
  return `audio.${audioExtension(contentType)}`;
}
