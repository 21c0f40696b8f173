import { strict as assert } from 'node:assert';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, mock, test } from 'node:test';
import { ConfigurationError, MediaNotFoundError, ProviderError } from '../lib/errors';
import { dubbedOutputPath, ElevenLabsDubbingService } from '../providers/elevenlabs';
import { createTempDir, formBody, jsonBody, jsonReply, requestHeader, stubFetch, type TempDir } from './helpers';

const BASE_URL = 'https://tts.example.test/v1';

function createService(): ElevenLabsDubbingService {
  return new ElevenLabsDubbingService({
    apiKey: 'test-secret',
    defaultVoiceId: 'voice-default',
    baseUrl: BASE_URL,
  });
}

describe('dubbedOutputPath', () => {
  test('appends the language to the file stem', () => {
    assert.equal(dubbedOutputPath('/media/report.mp3', 'fr'), '/media/report_fr.mp3');
    assert.equal(dubbedOutputPath('/media/clip.final.wav', 'es'), '/media/clip.final_es.wav');
  });
});

describe('ElevenLabsDubbingService', () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    mock.restoreAll();
    await temp.cleanup();
  });

  test('requires an API key', () => {
    assert.throws(() => new ElevenLabsDubbingService({ apiKey: '' }), ConfigurationError);
  });

  test('getVoices maps and filters by language label', async () => {
    const calls = stubFetch(() => jsonReply({
      voices: [
        {
          voice_id: 'v1',
          name: 'Lucia',
          description: 'Warm narrator',
          preview_url: 'https://tts.example.test/preview/v1.mp3',
          labels: { language: 'es', accent: 'castilian' },
        },
        { voice_id: 'v2', name: 'Sam' },
      ],
    }));
    const service = createService();

    const all = await service.getVoices();
    const spanish = await service.getVoices('es');

    assert.equal(calls[0].url, `${BASE_URL}/voices`);
    assert.equal(requestHeader(calls[0], 'xi-api-key'), 'test-secret');
    assert.deepEqual(all.map(voice => voice.id), ['v1', 'v2']);
    assert.equal(all[1].language, 'en');
    assert.deepEqual(spanish, [{
      id: 'v1',
      name: 'Lucia',
      language: 'es',
      description: 'Warm narrator',
      previewUrl: 'https://tts.example.test/preview/v1.mp3',
      labels: { language: 'es', accent: 'castilian' },
    }]);
  });

  test('textToSpeech posts voice settings and returns audio bytes', async () => {
    const calls = stubFetch(() => new Response(new Uint8Array([73, 68, 51]), {
      headers: { 'content-type': 'audio/mpeg' },
    }));
    const service = createService();

    const speech = await service.textToSpeech('Tonight on the late edition');

    assert.equal(calls[0].url, `${BASE_URL}/text-to-speech/voice-default`);
    assert.equal(requestHeader(calls[0], 'Content-Type'), 'application/json');
    assert.deepEqual(jsonBody(calls[0]), {
      text: 'Tonight on the late edition',
      model_id: 'eleven_multilingual_v2',
      voice_settings: { stability: 0.5, similarity_boost: 0.75 },
    });
    assert.deepEqual([...speech.audio], [73, 68, 51]);
    assert.equal(speech.format, 'mp3');
    assert.deepEqual(speech.metadata, {
      voice_id: 'voice-default',
      model_id: 'eleven_multilingual_v2',
      text_length: 27,
    });
  });

  test('textToSpeech honours explicit options', async () => {
    const calls = stubFetch(() => new Response(new Uint8Array([1])));
    const service = createService();

    await service.textToSpeech('Hi', { voiceId: 'v9', modelId: 'eleven_turbo', stability: 0.2, similarityBoost: 0.9 });

    assert.equal(calls[0].url, `${BASE_URL}/text-to-speech/v9`);
    assert.deepEqual(jsonBody(calls[0]), {
      text: 'Hi',
      model_id: 'eleven_turbo',
      voice_settings: { stability: 0.2, similarity_boost: 0.9 },
    });
  });

  test('an empty voice id falls back to the default voice', async () => {
    const calls = stubFetch(() => new Response('AUDIO'));
    const source = await temp.write('bulletin.mp3', 'ORIGINAL');
    const service = createService();

    const speech = await service.textToSpeech('Hi', { voiceId: '' });
    const dub = await service.dubAudio(source, 'fr', { voiceId: '' });

    assert.equal(calls[0].url, `${BASE_URL}/text-to-speech/voice-default`);
    assert.equal(speech.metadata['voice_id'], 'voice-default');
    assert.equal(formBody(calls[1]).get('voice_id'), 'voice-default');
    assert.equal(dub.voiceId, 'voice-default');
  });

  test('rate limiting surfaces as a provider error', async () => {
    stubFetch(() => new Response('slow down', { status: 429 }));
    const service = createService();

    await assert.rejects(service.textToSpeech('Hi'), (error: unknown) => {
      assert.ok(error instanceof ProviderError);
      assert.equal(error.status, 429);
      assert.equal(error.message, 'ElevenLabs rate limit exceeded');
      return true;
    });
  });

  test('dubAudio writes the dubbed file next to the source', async () => {
    const calls = stubFetch(() => new Response('DUBBED'));
    const source = await temp.write('segment.mp3', 'ORIGINAL');
    const service = createService();

    const result = await service.dubAudio(source, 'es');

    assert.equal(calls[0].url, `${BASE_URL}/dubbing`);
    const form = formBody(calls[0]);
    assert.equal(form.get('target_lang'), 'es');
    assert.equal(form.get('source_lang'), 'en');
    assert.equal(form.get('voice_id'), 'voice-default');

    assert.equal(result.audioPath, path.join(temp.dir, 'segment_es.mp3'));
    assert.equal(await readFile(result.audioPath, 'utf8'), 'DUBBED');
    assert.equal(result.language, 'es');
    assert.equal(result.voiceId, 'voice-default');
    assert.deepEqual(result.metadata, { source_language: 'en', source_file: source });
  });

  test('dubAudio with a missing file issues no request', async () => {
    const calls = stubFetch(() => new Response('DUBBED'));
    const service = createService();

    await assert.rejects(service.dubAudio(path.join(temp.dir, 'nope.mp3'), 'de'), MediaNotFoundError);
    assert.equal(calls.length, 0);
  });

  test('cloneVoice uploads every sample', async () => {
    const calls = stubFetch(() => jsonReply({ voice_id: 'cloned-1' }));
    const first = await temp.write('a.wav', 'A');
    const second = await temp.write('b.mp3', 'B');
    const service = createService();

    const voice = await service.cloneVoice('Field Reporter', [first, second], 'Outdoor voice');

    assert.equal(calls[0].url, `${BASE_URL}/voices/add`);
    const form = formBody(calls[0]);
    assert.equal(form.get('name'), 'Field Reporter');
    assert.equal(form.getAll('files').length, 2);
    assert.deepEqual(voice, {
      id: 'cloned-1',
      name: 'Field Reporter',
      language: 'en',
      description: 'Outdoor voice',
      labels: {},
    });
  });
});
