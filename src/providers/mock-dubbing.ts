// MOCK DUBBING
// Canned voices and placeholder audio bytes for demo mode

import type { MockConfig } from '../lib/config';
import { sleep } from '../lib/utils';
import type {
  DubOptions,
  DubbingResult,
  DubbingService,
  SpeechOptions,
  SpeechResult,
  Voice,
} from './types';

const TTS_LATENCY_MS = 500;
const DUB_LATENCY_MS = 1000;
const SECONDS_PER_CHARACTER = 0.05;
const MOCK_DUB_DURATION_SECONDS = 60;

function mockVoice(id: string, name: string, language: string, description: string): Voice {
  return { id, name, language, description, labels: { language } };
}

const MOCK_VOICES: readonly Voice[] = [
  mockVoice('voice-1', 'Dana (News Anchor)', 'en', 'Professional news anchor voice'),
  mockVoice('voice-2', 'Marcus (Reporter)', 'en', 'Field reporter voice'),
  mockVoice('voice-3', 'Lucia (Spanish)', 'es', 'Spanish female voice'),
  mockVoice('voice-4', 'Julien (French)', 'fr', 'French male voice'),
  mockVoice('voice-5', 'Lukas (German)', 'de', 'German male voice'),
];

export class MockDubbingService implements DubbingService {
  private readonly latencyScale: number;

  constructor(config: MockConfig = {}) {
    this.latencyScale = config.latencyScale ?? 1;
  }

  async getVoices(language?: string): Promise<Voice[]> {
    const voices = MOCK_VOICES.map(voice => ({ ...voice, labels: { ...voice.labels } }));
    return language ? voices.filter(voice => voice.language === language) : voices;
  }

  async textToSpeech(text: string, options: SpeechOptions = {}): Promise<SpeechResult> {
    await sleep(TTS_LATENCY_MS * this.latencyScale);

    return {
      audio: Buffer.from(`MOCK_AUDIO_DATA_${text.slice(0, 50)}`),
      format: 'mp3',
      duration: text.length * SECONDS_PER_CHARACTER,
      metadata: { mock: true, voice_id: options.voiceId ?? null },
    };
  }

  /**
   * Reports where dubbed audio would land; nothing is written
   */
  async dubAudio(audioPath: string, targetLanguage: string, options: DubOptions = {}): Promise<DubbingResult> {
    await sleep(DUB_LATENCY_MS * this.latencyScale);

    return {
      audioPath: `${audioPath}.${targetLanguage}.mp3`,
      language: targetLanguage,
      voiceId: options.voiceId ?? 'mock-voice',
      duration: MOCK_DUB_DURATION_SECONDS,
      metadata: { mock: true },
    };
  }

  async cloneVoice(name: string, _audioPaths: string[], description = ''): Promise<Voice> {
    await sleep(DUB_LATENCY_MS * this.latencyScale);

    const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
    return {
      id: `mock-clone-${slug || 'voice'}`,
      name,
      language: 'en',
      description,
      labels: { mock: 'true' },
    };
  }
}
