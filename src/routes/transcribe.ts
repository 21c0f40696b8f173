// TRANSCRIPTION ROUTE
// POST /transcribe - audio body or JSON { url }, rendered as JSON, SRT, WebVTT or plain text

import type { Context } from 'hono';
import { MAX_AUDIO_SIZE_BYTES } from '../lib/constants';
import {
  errorResponse,
  fileTooLargeResponse,
  invalidContentTypeResponse,
  invalidJsonResponse,
  missingFieldResponse,
} from '../lib/responses';
import { renderSubtitles, serializeTranscription, toPlainText, type TranscriptionResult } from '../lib/transcript';
import { isRecord, readString } from '../lib/utils';
import type { TranscribeOptions, TranscriptionService } from '../providers/types';

export type OutputFormat = 'json' | 'srt' | 'vtt' | 'text';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'srt', 'vtt', 'text'];

function extractFormat(c: Context): OutputFormat | undefined {
  const requested = (c.req.query('format') || 'json').toLowerCase().trim();
  return OUTPUT_FORMATS.find(format => format === requested);
}

function renderResult(c: Context, result: TranscriptionResult, format: OutputFormat): Response {
  switch (format) {
    case 'srt':
      return c.body(renderSubtitles(result, 'srt'), 200, { 'Content-Type': 'application/x-subrip; charset=UTF-8' });
    case 'vtt':
      return c.body(renderSubtitles(result, 'vtt'), 200, { 'Content-Type': 'text/vtt; charset=UTF-8' });
    case 'text':
      return c.text(toPlainText(result));
    case 'json':
      return c.json(serializeTranscription(result));
  }
}

export function transcribeRoute(service: TranscriptionService) {
  return async (c: Context): Promise<Response> => {
    const format = extractFormat(c);
    if (!format) {
      return errorResponse(400, 'Invalid format', `format must be one of ${OUTPUT_FORMATS.join(', ')}`, {
        received: c.req.query('format'),
      });
    }

    const options: TranscribeOptions = {
      language: c.req.query('language') || undefined,
      prompt: c.req.query('prompt') || undefined,
    };
    const contentType = c.req.header('Content-Type') || '';

    let result: TranscriptionResult;

    if (contentType.startsWith('audio/')) {
      const audio = await c.req.arrayBuffer();
      if (audio.byteLength === 0) {
        return errorResponse(400, 'Empty body', 'Request body must contain audio');
      }
      if (audio.byteLength > MAX_AUDIO_SIZE_BYTES) {
        return fileTooLargeResponse(audio.byteLength, MAX_AUDIO_SIZE_BYTES);
      }

      console.log(`Transcribe request: size=${audio.byteLength}, type=${contentType}, format=${format}`);
      result = await service.transcribeAudio(audio, { ...options, contentType });
    } else if (contentType.includes('application/json')) {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return invalidJsonResponse();
      }

      const url = isRecord(body) ? readString(body, 'url')?.trim() : undefined;
      if (!url) {
        return missingFieldResponse('url');
      }
      if (!URL.canParse(url)) {
        return errorResponse(400, 'Invalid URL', 'url must be an absolute URL', { received: url });
      }

      console.log(`Transcribe request: url=${url}, format=${format}`);
      result = await service.transcribeUrl(url, {
        ...options,
        language: options.language ?? (isRecord(body) ? readString(body, 'language') : undefined),
      });
    } else {
      return invalidContentTypeResponse('audio/* or application/json', contentType);
    }

    return renderResult(c, result, format);
  };
}
