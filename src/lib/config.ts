// CONFIGURATION
// Environment settings plus the per-service option structs and their defaults

import {
  DEFAULT_PORT,
  DEFAULT_TEXT_MODEL,
  DEFAULT_VISION_MODEL,
  DEFAULT_VOICE_ID,
  DEFAULT_WHISPER_MODEL,
  DUBBING_TIMEOUT_SECONDS,
  ELEVENLABS_BASE_URL,
  OPENAI_BASE_URL,
  TRANSCRIPTION_TIMEOUT_SECONDS,
  VISION_TIMEOUT_SECONDS,
} from './constants';

export interface WhisperConfig {
  /** OpenAI API key (required) */
  apiKey: string;
  /** Whisper model id (default: whisper-1) */
  model?: string;
  /** Request timeout in seconds (default: 300) */
  timeoutSeconds?: number;
  baseUrl?: string;
}

export interface ElevenLabsConfig {
  /** ElevenLabs API key (required) */
  apiKey: string;
  /** Voice used when a call names none (default: Rachel) */
  defaultVoiceId?: string;
  /** Request timeout in seconds for voices and TTS (default: 60) */
  timeoutSeconds?: number;
  baseUrl?: string;
}

export interface VisionConfig {
  /** OpenAI API key (required) */
  apiKey: string;
  /** Model used for image analysis (default: gpt-4-vision-preview) */
  model?: string;
  /** Model used for viral-moment detection (default: gpt-4-turbo-preview) */
  textModel?: string;
  /** Request timeout in seconds (default: 60) */
  timeoutSeconds?: number;
  baseUrl?: string;
}

export interface MockConfig {
  /** Multiplier applied to simulated latency; 0 disables delays (default: 1) */
  latencyScale?: number;
}

export interface Settings {
  productionMode: boolean;
  openaiApiKey?: string;
  whisperModel: string;
  visionModel: string;
  textModel: string;
  elevenLabsApiKey?: string;
  elevenLabsVoiceId: string;
  transcriptionTimeoutSeconds: number;
  dubbingTimeoutSeconds: number;
  visionTimeoutSeconds: number;
  mockLatencyScale: number;
  port: number;
}

export const WHISPER_DEFAULTS = {
  model: DEFAULT_WHISPER_MODEL,
  timeoutSeconds: TRANSCRIPTION_TIMEOUT_SECONDS,
  baseUrl: OPENAI_BASE_URL,
} as const;

export const ELEVENLABS_DEFAULTS = {
  defaultVoiceId: DEFAULT_VOICE_ID,
  timeoutSeconds: DUBBING_TIMEOUT_SECONDS,
  baseUrl: ELEVENLABS_BASE_URL,
} as const;

export const VISION_DEFAULTS = {
  model: DEFAULT_VISION_MODEL,
  textModel: DEFAULT_TEXT_MODEL,
  timeoutSeconds: VISION_TIMEOUT_SECONDS,
  baseUrl: OPENAI_BASE_URL,
} as const;

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.warn(`Invalid ${name}, using default`, { provided: value, fallback });
    return fallback;
  }
  return parsed;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read settings from the environment
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    productionMode: parseBoolean(env.PRODUCTION_MODE),
    openaiApiKey: optional(env.OPENAI_API_KEY),
    whisperModel: optional(env.OPENAI_WHISPER_MODEL) ?? WHISPER_DEFAULTS.model,
    visionModel: optional(env.OPENAI_VISION_MODEL) ?? VISION_DEFAULTS.model,
    textModel: optional(env.OPENAI_MODEL) ?? VISION_DEFAULTS.textModel,
    elevenLabsApiKey: optional(env.ELEVENLABS_API_KEY),
    elevenLabsVoiceId: optional(env.ELEVENLABS_VOICE_ID) ?? ELEVENLABS_DEFAULTS.defaultVoiceId,
    transcriptionTimeoutSeconds: parseNumber('TRANSCRIPTION_TIMEOUT_SECONDS', env.TRANSCRIPTION_TIMEOUT_SECONDS, WHISPER_DEFAULTS.timeoutSeconds),
    dubbingTimeoutSeconds: parseNumber('DUBBING_TIMEOUT_SECONDS', env.DUBBING_TIMEOUT_SECONDS, ELEVENLABS_DEFAULTS.timeoutSeconds),
    visionTimeoutSeconds: parseNumber('VISION_TIMEOUT_SECONDS', env.VISION_TIMEOUT_SECONDS, VISION_DEFAULTS.timeoutSeconds),
    mockLatencyScale: parseNumber('MOCK_LATENCY_SCALE', env.MOCK_LATENCY_SCALE, 1),
    port: parseNumber('PORT', env.PORT, DEFAULT_PORT),
  };
}
