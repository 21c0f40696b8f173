// DUBBING ROUTES
// GET /voices - available voices, POST /tts - text-to-speech as audio/mpeg

import type { Context } from 'hono';
import { MAX_TTS_TEXT_LENGTH } from '../lib/constants';
import {
  errorResponse,
  invalidContentTypeResponse,
  invalidJsonResponse,
  missingFieldResponse,
} from '../lib/responses';
import { serializeVoice } from '../lib/serializers';
import { isRecord, readNumber, readString } from '../lib/utils';
import type { DubbingService, SpeechOptions } from '../providers/types';

function isUnitInterval(value: number | undefined): boolean {
  return value === undefined || (value >= 0 && value <= 1);
}

export function voicesRoute(service: DubbingService) {
  return async (c: Context): Promise<Response> => {
    const language = c.req.query('language') || undefined;
    const voices = await service.getVoices(language);
    return c.json({ voices: voices.map(serializeVoice) });
  };
}

export function textToSpeechRoute(service: DubbingService) {
  return async (c: Context): Promise<Response> => {
    const contentType = c.req.header('Content-Type') || '';
    if (!contentType.includes('application/json')) {
      return invalidContentTypeResponse('application/json', contentType);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return invalidJsonResponse();
    }
    if (!isRecord(body)) {
      return invalidJsonResponse();
    }

    const text = readString(body, 'text')?.trim() ?? '';
    if (!text) {
      return missingFieldResponse('text');
    }
    if (text.length > MAX_TTS_TEXT_LENGTH) {
      return errorResponse(400, 'Text too long', `Text must be ${MAX_TTS_TEXT_LENGTH} characters or less`, {
        max_length: MAX_TTS_TEXT_LENGTH,
        actual_length: text.length,
      });
    }

    const options: SpeechOptions = {
      voiceId: readString(body, 'voice_id')?.trim() || undefined,
      modelId: readString(body, 'model_id'),
      stability: readNumber(body, 'stability'),
      similarityBoost: readNumber(body, 'similarity_boost'),
    };
    if (!isUnitInterval(options.stability) || !isUnitInterval(options.similarityBoost)) {
      return errorResponse(400, 'Invalid voice settings', 'stability and similarity_boost must be between 0 and 1');
    }

    const speech = await service.textToSpeech(text, options);
    console.log(`TTS success: ${text.length} chars -> ${speech.audio.byteLength} bytes`);

    return c.body(new Uint8Array(speech.audio), 200, {
      'Content-Type': 'audio/mpeg',
      'X-Audio-Duration': speech.duration.toFixed(2),
    });
  };
}
