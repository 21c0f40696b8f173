// HTTP APPLICATION
// Hono routes over the transcription, dubbing and vision services

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorResponse, serviceErrorResponse } from './lib/responses';
import type { AiServices } from './providers/types';
import { textToSpeechRoute, voicesRoute } from './routes/dubbing';
import { transcribeRoute } from './routes/transcribe';
import { viralMomentsRoute } from './routes/vision';

export function createApp(services: AiServices): Hono {
  const app = new Hono();

  app.use('*', cors({
    origin: '*',
    allowHeaders: ['Content-Type'],
    allowMethods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      mode: services.mode,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/transcribe', transcribeRoute(services.transcription));
  app.get('/voices', voicesRoute(services.dubbing));
  app.post('/tts', textToSpeechRoute(services.dubbing));
  app.post('/vision/viral-moments', viralMomentsRoute(services.vision));

  app.notFound(() => errorResponse(404, 'Not found', 'No route matches this request'));

  app.onError((err) => {
    console.error('Unhandled error:', err);
    return serviceErrorResponse(err);
  });

  return app;
}
