// SERVICE SELECTION
// Live or mock implementations per capability, chosen by settings

import type { Settings } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { ElevenLabsDubbingService } from './elevenlabs';
import { MockDubbingService } from './mock-dubbing';
import { MockTranscriptionService } from './mock-transcription';
import { MockVisionService } from './mock-vision';
import { OpenAIVisionService } from './openai-vision';
import type { AiServices } from './types';
import { WhisperTranscriptionService } from './whisper';

/**
 * Build the service set. Production mode requires both API keys.
 */
export function createServices(settings: Settings): AiServices {
  if (!settings.productionMode) {
    const mockConfig = { latencyScale: settings.mockLatencyScale };
    return {
      mode: 'mock',
      transcription: new MockTranscriptionService(mockConfig),
      dubbing: new MockDubbingService(mockConfig),
      vision: new MockVisionService(mockConfig),
    };
  }

  const { openaiApiKey, elevenLabsApiKey } = settings;
  if (!openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY not configured');
  }
  if (!elevenLabsApiKey) {
    throw new ConfigurationError('ELEVENLABS_API_KEY not configured');
  }

  return {
    mode: 'live',
    transcription: new WhisperTranscriptionService({
      apiKey: openaiApiKey,
      model: settings.whisperModel,
      timeoutSeconds: settings.transcriptionTimeoutSeconds,
    }),
    dubbing: new ElevenLabsDubbingService({
      apiKey: elevenLabsApiKey,
      defaultVoiceId: settings.elevenLabsVoiceId,
      timeoutSeconds: settings.dubbingTimeoutSeconds,
    }),
    vision: new OpenAIVisionService({
      apiKey: openaiApiKey,
      model: settings.visionModel,
      textModel: settings.textModel,
      timeoutSeconds: settings.visionTimeoutSeconds,
    }),
  };
}
