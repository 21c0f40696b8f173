// MOCK VISION
// Canned scene analyses, viral moments and compliance issues for demo mode

import type { MockConfig } from '../lib/config';
import { sleep } from '../lib/utils';
import type {
  ComplianceIssue,
  FrameAnalysisOptions,
  ImageAnalysisOptions,
  SceneAnalysis,
  ViralMoment,
  VisionService,
} from './types';

const IMAGE_LATENCY_MS = 300;
const FRAME_LATENCY_MS = 100;
const VIRAL_LATENCY_MS = 500;
const COMPLIANCE_LATENCY_MS = 300;
const MOCK_FRAME_INTERVAL_SECONDS = 5.0;

const MOCK_SCENES: ReadonlyArray<{ description: string; emotions: string[] }> = [
  { description: 'Anchor opens the broadcast with the lead story', emotions: ['serious'] },
  { description: 'Cut to live reporter at the substation', emotions: ['urgent'] },
  { description: 'Wide shot of repair trucks under floodlights', emotions: ['dramatic'] },
  { description: 'Close-up of line workers on a bucket lift', emotions: ['action'] },
  { description: 'Reporter interviews a resident outside a shelter', emotions: ['emotional'] },
];

export class MockVisionService implements VisionService {
  private readonly latencyScale: number;

  constructor(config: MockConfig = {}) {
    this.latencyScale = config.latencyScale ?? 1;
  }

  async analyzeImage(_imagePath: string, options: ImageAnalysisOptions = {}): Promise<SceneAnalysis> {
    await sleep(IMAGE_LATENCY_MS * this.latencyScale);

    return {
      timestamp: options.timestamp ?? 0,
      description: 'News anchor at desk delivering a breaking story about a regional power outage',
      emotions: ['concerned', 'professional'],
      objects: ['desk', 'microphone', 'monitor', 'graphics'],
      peopleCount: 1,
      textDetected: ['BREAKING NEWS', 'POWER OUTAGE'],
      confidence: 0.95,
      tags: ['news', 'broadcast', 'breaking', 'outage'],
    };
  }

  /**
   * Cycles through five canned scenes, one every five seconds
   */
  async analyzeVideoFrames(framePaths: string[], options: FrameAnalysisOptions = {}): Promise<SceneAnalysis[]> {
    const interval = options.frameInterval ?? MOCK_FRAME_INTERVAL_SECONDS;
    const analyses: SceneAnalysis[] = [];

    for (let i = 0; i < framePaths.length; i++) {
      const scene = MOCK_SCENES[i % MOCK_SCENES.length];
      analyses.push({
        timestamp: i * interval,
        description: scene.description,
        emotions: [...scene.emotions],
        objects: ['camera', 'equipment'],
        peopleCount: 2,
        textDetected: [],
        confidence: 0.9,
        tags: ['news', 'breaking'],
      });
      await sleep(FRAME_LATENCY_MS * this.latencyScale);
    }

    return analyses;
  }

  async detectViralMoments(_analyses: SceneAnalysis[], _transcript?: string): Promise<ViralMoment[]> {
    await sleep(VIRAL_LATENCY_MS * this.latencyScale);

    return [
      {
        startTime: 145.0,
        endTime: 162.0,
        title: "Reporter's Close Call with a Falling Branch",
        description: 'Live reporter steps aside as a branch drops behind the camera',
        viralScore: 0.97,
        emotion: 'shock',
        reasoning: 'Unscripted near-miss moments on live TV draw heavy sharing',
        suggestedHashtags: ['#Breaking', '#CloseCall', '#LiveTV'],
        platforms: ['TikTok', 'Twitter', 'Instagram'],
      },
      {
        startTime: 892.0,
        endTime: 918.0,
        title: 'Lights Come Back On',
        description: 'Neighborhood cheers as power is restored on air',
        viralScore: 0.95,
        emotion: 'heartwarming',
        reasoning: 'Shared relief moments perform well across platforms',
        suggestedHashtags: ['#GoodNews', '#PowerRestored', '#Community'],
        platforms: ['Facebook', 'Instagram', 'TikTok'],
      },
    ];
  }

  async checkCompliance(_framePaths: string[], _transcript?: string): Promise<ComplianceIssue[]> {
    await sleep(COMPLIANCE_LATENCY_MS * this.latencyScale);

    return [{
      timestamp: 125.5,
      issueType: 'profanity',
      severity: 'high',
      description: 'Potential profanity detected in interview',
      confidence: 0.85,
      recommendation: 'Review audio and consider bleeping',
    }];
  }
}
