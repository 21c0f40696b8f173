import { strict as assert } from 'node:assert';
import { afterEach, describe, mock, test } from 'node:test';
import { loadSettings } from '../lib/config';

describe('loadSettings', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  test('defaults to mock mode with stock models', () => {
    assert.deepEqual(loadSettings({}), {
      productionMode: false,
      openaiApiKey: undefined,
      whisperModel: 'whisper-1',
      visionModel: 'gpt-4-vision-preview',
      textModel: 'gpt-4-turbo-preview',
      elevenLabsApiKey: undefined,
      elevenLabsVoiceId: '21m00Tcm4TlvDq8ikWAM',
      transcriptionTimeoutSeconds: 300,
      dubbingTimeoutSeconds: 60,
      visionTimeoutSeconds: 60,
      mockLatencyScale: 1,
      port: 8080,
    });
  });

  test('reads credentials and overrides', () => {
    const settings = loadSettings({
      PRODUCTION_MODE: 'TRUE',
      OPENAI_API_KEY: ' test-secret ',
      ELEVENLABS_API_KEY: 'test-secret-2',
      OPENAI_WHISPER_MODEL: 'whisper-large',
      TRANSCRIPTION_TIMEOUT_SECONDS: '120',
      MOCK_LATENCY_SCALE: '0',
      PORT: '3000',
    });

    assert.equal(settings.productionMode, true);
    assert.equal(settings.openaiApiKey, 'test-secret');
    assert.equal(settings.elevenLabsApiKey, 'test-secret-2');
    assert.equal(settings.whisperModel, 'whisper-large');
    assert.equal(settings.transcriptionTimeoutSeconds, 120);
    assert.equal(settings.mockLatencyScale, 0);
    assert.equal(settings.port, 3000);
  });

  test('invalid numbers fall back to defaults with a warning', () => {
    const warn = mock.method(console, 'warn', () => undefined);

    const settings = loadSettings({ VISION_TIMEOUT_SECONDS: 'soon', PORT: '-1' });

    assert.equal(settings.visionTimeoutSeconds, 60);
    assert.equal(settings.port, 8080);
    assert.equal(warn.mock.callCount(), 2);
  });

  test('blank keys count as missing', () => {
    assert.equal(loadSettings({ OPENAI_API_KEY: '   ' }).openaiApiKey, undefined);
  });
});
