// SHARED CONSTANTS

// API bases
export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const ELEVENLABS_BASE_URL = 'https://api.elevenlabs.io/v1';

// Model defaults
export const DEFAULT_WHISPER_MODEL = 'whisper-1';
export const DEFAULT_VISION_MODEL = 'gpt-4-vision-preview';
export const DEFAULT_TEXT_MODEL = 'gpt-4-turbo-preview';
export const DEFAULT_TTS_MODEL = 'eleven_multilingual_v2';
export const DEFAULT_VOICE_ID = '21m00Tcm4TlvDq8ikWAM'; // Rachel

// Timeouts (seconds)
export const TRANSCRIPTION_TIMEOUT_SECONDS = 300;
export const DUBBING_TIMEOUT_SECONDS = 60;
export const DUBBING_JOB_TIMEOUT_SECONDS = 300; // full-file dubbing runs much longer than TTS
export const VOICE_CLONE_TIMEOUT_SECONDS = 120;
export const VISION_TIMEOUT_SECONDS = 60;

// Vision
export const TRANSCRIPT_EXCERPT_LENGTH = 500;
export const DEFAULT_FRAME_INTERVAL_SECONDS = 1.0;

// HTTP surface
export const DEFAULT_PORT = 8080;
export const MAX_TTS_TEXT_LENGTH = 5000;
export const MAX_AUDIO_SIZE_BYTES = 25 * 1024 * 1024; // Whisper upload limit
