import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { loadSettings } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { createServices } from '../providers';
import { ElevenLabsDubbingService } from '../providers/elevenlabs';
import { MockDubbingService } from '../providers/mock-dubbing';
import { MockTranscriptionService } from '../providers/mock-transcription';
import { MockVisionService } from '../providers/mock-vision';
import { OpenAIVisionService } from '../providers/openai-vision';
import { WhisperTranscriptionService } from '../providers/whisper';

describe('createServices', () => {
  test('demo mode uses mocks without credentials', () => {
    const services = createServices(loadSettings({}));

    assert.equal(services.mode, 'mock');
    assert.ok(services.transcription instanceof MockTranscriptionService);
    assert.ok(services.dubbing instanceof MockDubbingService);
    assert.ok(services.vision instanceof MockVisionService);
  });

  test('production mode uses live clients', () => {
    const services = createServices(loadSettings({
      PRODUCTION_MODE: 'true',
      OPENAI_API_KEY: 'test-secret',
      ELEVENLABS_API_KEY: 'test-secret',
    }));

    assert.equal(services.mode, 'live');
    assert.ok(services.transcription instanceof WhisperTranscriptionService);
    assert.ok(services.dubbing instanceof ElevenLabsDubbingService);
    assert.ok(services.vision instanceof OpenAIVisionService);
  });

  test('production mode without keys is a configuration error', () => {
    assert.throws(
      () => createServices(loadSettings({ PRODUCTION_MODE: '1', ELEVENLABS_API_KEY: 'test-secret' })),
      (error: unknown) => error instanceof ConfigurationError && error.message === 'OPENAI_API_KEY not configured'
    );
    assert.throws(
      () => createServices(loadSettings({ PRODUCTION_MODE: '1', OPENAI_API_KEY: 'test-secret' })),
      (error: unknown) => error instanceof ConfigurationError && error.message === 'ELEVENLABS_API_KEY not configured'
    );
  });
});
