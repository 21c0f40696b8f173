// MOCK TRANSCRIPTION
// Canned newscast transcript for demo mode, no API calls

import { createSegment, joinSegmentText, type TranscriptionResult } from '../lib/transcript';
import type { MockConfig } from '../lib/config';
import { sleep } from '../lib/utils';
import type { TranscribeOptions, TranscriptionService } from './types';

const SIMULATED_LATENCY_MS = 1000;

const MOCK_SEGMENTS = [
  createSegment({ start: 0.0, end: 4.2, text: "Good evening, I'm Dana Reyes, and this is the Channel 9 late edition.", speaker: 'Anchor', confidence: 0.99 }),
  createSegment({ start: 4.5, end: 9.8, text: 'Our top story: a storm system has knocked out power across the river district.', speaker: 'Anchor', confidence: 0.98 }),
  createSegment({ start: 10.2, end: 15.5, text: 'Utility crews have been working since early afternoon to restore service.', speaker: 'Anchor', confidence: 0.97 }),
  createSegment({ start: 16.0, end: 20.3, text: "Let's go live to Marcus Hale at the substation. Marcus, what are you seeing?", speaker: 'Anchor', confidence: 0.98 }),
  createSegment({ start: 21.0, end: 27.5, text: 'Dana, there are at least a dozen repair trucks lined up behind me right now.', speaker: 'Reporter', confidence: 0.96 }),
  createSegment({ start: 28.0, end: 34.2, text: 'Officials say a fallen tree took down two transmission lines just after noon.', speaker: 'Reporter', confidence: 0.94 }),
  createSegment({ start: 34.8, end: 41.0, text: 'The operations manager told me most homes should have power back by midnight.', speaker: 'Reporter', confidence: 0.97 }),
  createSegment({ start: 41.5, end: 48.3, text: 'You can hear the generators running as they bring the backup systems online.', speaker: 'Reporter', confidence: 0.89 }),
  createSegment({ start: 49.0, end: 55.8, text: 'So far there are no reports of injuries, and the shelters remain open tonight.', speaker: 'Reporter', confidence: 0.98 }),
  createSegment({ start: 56.2, end: 62.0, text: "We'll keep following this through the night. Back to you in the studio, Dana.", speaker: 'Reporter', confidence: 0.97 }),
];

export class MockTranscriptionService implements TranscriptionService {
  private readonly latencyScale: number;

  constructor(config: MockConfig = {}) {
    this.latencyScale = config.latencyScale ?? 1;
  }

  async transcribe(_filePath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    return this.buildResult(options);
  }

  async transcribeUrl(_url: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    return this.buildResult(options);
  }

  async transcribeAudio(_audio: ArrayBuffer | Uint8Array, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    return this.buildResult(options);
  }

  private async buildResult(options: TranscribeOptions): Promise<TranscriptionResult> {
    await sleep(SIMULATED_LATENCY_MS * this.latencyScale);

    const language = options.language ?? 'en';
    const segments = MOCK_SEGMENTS.map(segment => createSegment({ ...segment, language }));
    const last = segments[segments.length - 1];

    return {
      segments,
      language,
      duration: last.end,
      text: joinSegmentText(segments),
      metadata: { mock: true },
    };
  }
}
