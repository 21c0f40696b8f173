// ELEVENLABS PROVIDER
// Voices, text-to-speech, full-file dubbing and voice cloning

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ELEVENLABS_DEFAULTS, type ElevenLabsConfig } from '../lib/config';
import { DEFAULT_TTS_MODEL, DUBBING_JOB_TIMEOUT_SECONDS, VOICE_CLONE_TIMEOUT_SECONDS } from '../lib/constants';
import { ConfigurationError } from '../lib/errors';
import { ensureFileExists, requestProvider, requestProviderJson } from '../lib/http';
import { DEFAULT_LANGUAGE } from '../lib/transcript';
import { audioContentType, isRecord, readRecordArray, readString } from '../lib/utils';
import type {
  DubOptions,
  DubbingResult,
  DubbingService,
  SpeechOptions,
  SpeechResult,
  Voice,
} from './types';

const PROVIDER = 'ElevenLabs';

function readLabels(record: Record<string, unknown>): Record<string, string> {
  const raw = record['labels'];
  if (!isRecord(raw)) {
    return {};
  }

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      labels[key] = value;
    }
  }
  return labels;
}

export function parseVoice(record: Record<string, unknown>): Voice {
  const labels = readLabels(record);
  const previewUrl = readString(record, 'preview_url');

  return {
    id: readString(record, 'voice_id') ?? '',
    name: readString(record, 'name') ?? '',
    language: labels['language'] ?? DEFAULT_LANGUAGE,
    description: readString(record, 'description') ?? '',
    ...(previewUrl ? { previewUrl } : {}),
    labels,
  };
}

/**
 * Sibling path for dubbed output: /media/report.mp3 -> /media/report_es.mp3
 */
export function dubbedOutputPath(audioPath: string, targetLanguage: string): string {
  const parsed = path.parse(audioPath);
  return path.join(parsed.dir, `${parsed.name}_${targetLanguage}${parsed.ext}`);
}

export class ElevenLabsDubbingService implements DubbingService {
  private readonly apiKey: string;
  private readonly defaultVoiceId: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(config: ElevenLabsConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('ELEVENLABS_API_KEY not configured');
    }
    this.apiKey = config.apiKey;
    this.defaultVoiceId = config.defaultVoiceId ?? ELEVENLABS_DEFAULTS.defaultVoiceId;
    this.timeoutMs = (config.timeoutSeconds ?? ELEVENLABS_DEFAULTS.timeoutSeconds) * 1000;
    this.baseUrl = config.baseUrl ?? ELEVENLABS_DEFAULTS.baseUrl;
  }

  private headers(): Record<string, string> {
    return {
      'xi-api-key': this.apiKey,
      'Accept': 'application/json',
    };
  }

  /**
   * List account voices, optionally only those labelled with `language`
   */
  async getVoices(language?: string): Promise<Voice[]> {
    const data = await requestProviderJson(PROVIDER, `${this.baseUrl}/voices`, {
      method: 'GET',
      headers: this.headers(),
    }, this.timeoutMs);

    const voices = readRecordArray(isRecord(data) ? data : {}, 'voices').map(parseVoice);
    return language === undefined ? voices : voices.filter(voice => voice.language === language);
  }

  async textToSpeech(text: string, options: SpeechOptions = {}): Promise<SpeechResult> {
    const voiceId = options.voiceId || this.defaultVoiceId;
    const modelId = options.modelId ?? DEFAULT_TTS_MODEL;

    console.log(`ElevenLabs TTS: ${text.length} chars with voice ${voiceId}`);

    const response = await requestProvider(PROVIDER, `${this.baseUrl}/text-to-speech/${voiceId}`, {
      method: 'POST',
      headers: {
        ...this.headers(),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text,
        model_id: modelId,
        voice_settings: {
          stability: options.stability ?? 0.5,
          similarity_boost: options.similarityBoost ?? 0.75,
        },
      }),
    }, this.timeoutMs);

    return {
      audio: Buffer.from(await response.arrayBuffer()),
      format: 'mp3',
      duration: 0,
      metadata: {
        voice_id: voiceId,
        model_id: modelId,
        text_length: text.length,
      },
    };
  }

  /**
   * Dub a whole file and write the result next to the source
   */
  async dubAudio(audioPath: string, targetLanguage: string, options: DubOptions = {}): Promise<DubbingResult> {
    await ensureFileExists(audioPath);

    const voiceId = options.voiceId || this.defaultVoiceId;
    const sourceLanguage = options.sourceLanguage ?? DEFAULT_LANGUAGE;
    const fileName = path.basename(audioPath);

    console.log(`ElevenLabs dubbing ${fileName} to ${targetLanguage}`);

    const audio = await readFile(audioPath);
    const formData = new FormData();
    formData.append('file', new Blob([audio], { type: audioContentType(fileName) }), fileName);
    formData.append('target_lang', targetLanguage);
    formData.append('source_lang', sourceLanguage);
    formData.append('voice_id', voiceId);

    const response = await requestProvider(PROVIDER, `${this.baseUrl}/dubbing`, {
      method: 'POST',
      headers: this.headers(),
      body: formData,
    }, DUBBING_JOB_TIMEOUT_SECONDS * 1000);

    const outputPath = dubbedOutputPath(audioPath, targetLanguage);
    await writeFile(outputPath, Buffer.from(await response.arrayBuffer()));

    return {
      audioPath: outputPath,
      language: targetLanguage,
      voiceId,
      duration: 0,
      metadata: {
        source_language: sourceLanguage,
        source_file: audioPath,
      },
    };
  }

  /**
   * Create an instant voice clone from sample recordings
   */
  async cloneVoice(name: string, audioPaths: string[], description = ''): Promise<Voice> {
    for (const samplePath of audioPaths) {
      await ensureFileExists(samplePath);
    }

    const formData = new FormData();
    formData.append('name', name);
    formData.append('description', description);
    for (const samplePath of audioPaths) {
      const fileName = path.basename(samplePath);
      const sample = await readFile(samplePath);
      formData.append('files', new Blob([sample], { type: audioContentType(fileName) }), fileName);
    }

    const data = await requestProviderJson(PROVIDER, `${this.baseUrl}/voices/add`, {
      method: 'POST',
      headers: this.headers(),
      body: formData,
    }, VOICE_CLONE_TIMEOUT_SECONDS * 1000);

    const voiceId = isRecord(data) ? readString(data, 'voice_id') : undefined;
    if (!voiceId) {
      throw new Error('ElevenLabs voice clone response is missing voice_id');
    }

    console.log(`ElevenLabs cloned voice ${name} as ${voiceId}`);

    return {
      id: voiceId,
      name,
      language: DEFAULT_LANGUAGE,
      description,
      labels: {},
    };
  }
}
