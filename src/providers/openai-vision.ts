// OPENAI VISION PROVIDER
// Frame analysis, viral moment detection and compliance screening via chat completions

import { readFile } from 'node:fs/promises';
import { VISION_DEFAULTS, type VisionConfig } from '../lib/config';
import { DEFAULT_FRAME_INTERVAL_SECONDS, TRANSCRIPT_EXCERPT_LENGTH } from '../lib/constants';
import { ConfigurationError } from '../lib/errors';
import { ensureFileExists, requestProviderJson } from '../lib/http';
import {
  imageContentType,
  isRecord,
  readNumber,
  readRecordArray,
  readString,
  readStringArray,
} from '../lib/utils';
import type {
  ComplianceIssue,
  ComplianceSeverity,
  FrameAnalysisOptions,
  ImageAnalysisOptions,
  SceneAnalysis,
  ViralMoment,
  VisionService,
} from './types';

const PROVIDER = 'OpenAI';

const SCENE_PROMPT = `Analyze this video frame and provide:
1. A brief description of what's happening
2. Detected emotions (list)
3. Key objects visible (list)
4. Number of people visible
5. Any text visible in frame
6. Relevant tags for this content

Respond in JSON format with keys: description, emotions, objects, people_count, text, tags`;

const COMPLIANCE_PROMPT = `Analyze this frame for broadcast compliance issues:
- Inappropriate or adult content
- Violence or disturbing imagery
- Offensive text or symbols
- Brand logos (may require clearance)
- Any content unsuitable for broadcast

If issues found, respond with JSON: {"issues": [{"type": "", "severity": "", "description": "", "recommendation": ""}]}
If no issues: {"issues": []}`;

const VIRAL_INSTRUCTIONS = `Identify moments with high viral potential. For each, provide:
- Time range (start_time, end_time in seconds)
- Catchy title
- Description
- Viral score (0-1)
- Primary emotion
- Why it could go viral
- Suggested hashtags
- Best platforms

Respond in JSON format as a list of viral moments.`;

const SEVERITIES: readonly ComplianceSeverity[] = ['low', 'medium', 'high', 'critical'];

type ChatContent =
  | string
  | Array<{ type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } }>;

/**
 * Parse model output as JSON, tolerating a ```json fenced block.
 * Returns undefined when the content is not JSON.
 */
export function extractJson(content: string): unknown {
  let candidate = content;
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    candidate = fenced[1];
  }

  try {
    return JSON.parse(candidate.trim());
  } catch {
    return undefined;
  }
}

function readMessageContent(payload: unknown): string {
  if (!isRecord(payload)) {
    return '';
  }
  const choice = readRecordArray(payload, 'choices')[0];
  const message = choice && isRecord(choice['message']) ? choice['message'] : undefined;
  return message ? readString(message, 'content') ?? '' : '';
}

/**
 * Map a scene description onto SceneAnalysis; non-JSON content becomes the description
 */
export function parseSceneAnalysis(content: string, timestamp: number): SceneAnalysis {
  const parsed = extractJson(content);
  const data = isRecord(parsed) ? parsed : { description: content };

  return {
    timestamp,
    description: readString(data, 'description') ?? '',
    emotions: readStringArray(data, 'emotions'),
    objects: readStringArray(data, 'objects'),
    peopleCount: readNumber(data, 'people_count') ?? 0,
    textDetected: readStringArray(data, 'text'),
    confidence: 1.0,
    tags: readStringArray(data, 'tags'),
  };
}

export function parseViralMoments(content: string): ViralMoment[] {
  const parsed = extractJson(content);
  if (!Array.isArray(parsed)) {
    return [];
  }

  return parsed.filter(isRecord).map(moment => ({
    startTime: readNumber(moment, 'start_time') ?? 0,
    endTime: readNumber(moment, 'end_time') ?? 0,
    title: readString(moment, 'title') ?? '',
    description: readString(moment, 'description') ?? '',
    viralScore: readNumber(moment, 'viral_score') ?? 0.5,
    emotion: readString(moment, 'emotion') ?? '',
    reasoning: readString(moment, 'reasoning') ?? readString(moment, 'why') ?? '',
    suggestedHashtags: readStringArray(moment, 'hashtags'),
    platforms: readStringArray(moment, 'platforms'),
  }));
}

function toSeverity(value: string | undefined): ComplianceSeverity {
  const normalized = value?.toLowerCase();
  return SEVERITIES.find(severity => severity === normalized) ?? 'medium';
}

/**
 * Issues reported for one frame. A non-JSON answer that calls the frame
 * inappropriate counts as a single content issue.
 */
export function parseComplianceIssues(content: string, timestamp: number): ComplianceIssue[] {
  const parsed = extractJson(content);

  if (!isRecord(parsed)) {
    if (!content.toLowerCase().includes('inappropriate')) {
      return [];
    }
    return [{
      timestamp,
      issueType: 'content',
      severity: 'medium',
      description: content,
      confidence: 0.8,
      recommendation: 'Review content before broadcast',
    }];
  }

  return readRecordArray(parsed, 'issues').map(issue => ({
    timestamp,
    issueType: readString(issue, 'type') || 'content',
    severity: toSeverity(readString(issue, 'severity')),
    description: readString(issue, 'description') ?? '',
    confidence: readNumber(issue, 'confidence') ?? 0.8,
    recommendation: readString(issue, 'recommendation') || 'Review content before broadcast',
  }));
}

// Whole seconds keep one decimal place: 12 -> "12.0"
function formatSceneTime(seconds: number): string {
  return Number.isInteger(seconds) ? seconds.toFixed(1) : String(seconds);
}

export function buildViralContext(analyses: SceneAnalysis[], transcript?: string): string {
  let context = 'Analyze these video scenes for viral potential:\n\n';
  for (const analysis of analyses) {
    context += `[${formatSceneTime(analysis.timestamp)}s] ${analysis.description}\n`;
    context += `  Emotions: ${analysis.emotions.join(', ')}\n`;
  }

  if (transcript) {
    context += `\nTranscript excerpt: ${transcript.slice(0, TRANSCRIPT_EXCERPT_LENGTH)}\n`;
  }

  return context;
}

export class OpenAIVisionService implements VisionService {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly textModel: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(config: VisionConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY not configured');
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? VISION_DEFAULTS.model;
    this.textModel = config.textModel ?? VISION_DEFAULTS.textModel;
    this.timeoutMs = (config.timeoutSeconds ?? VISION_DEFAULTS.timeoutSeconds) * 1000;
    this.baseUrl = config.baseUrl ?? VISION_DEFAULTS.baseUrl;
  }

  private async requestChat(model: string, content: ChatContent, maxTokens: number): Promise<string> {
    const payload = await requestProviderJson(PROVIDER, `${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model,
        messages: [{ role: 'user', content }],
        max_tokens: maxTokens,
      }),
    }, this.timeoutMs);

    return readMessageContent(payload);
  }

  private async describeImage(imagePath: string, prompt: string): Promise<string> {
    await ensureFileExists(imagePath);

    const imageData = (await readFile(imagePath)).toString('base64');
    const mediaType = imageContentType(imagePath);

    return this.requestChat(this.model, [
      { type: 'text', text: prompt },
      { type: 'image_url', image_url: { url: `data:${mediaType};base64,${imageData}` } },
    ], 500);
  }

  async analyzeImage(imagePath: string, options: ImageAnalysisOptions = {}): Promise<SceneAnalysis> {
    const content = await this.describeImage(imagePath, options.prompt ?? SCENE_PROMPT);
    return parseSceneAnalysis(content, options.timestamp ?? 0);
  }

  /**
   * Frames are analyzed one after another so results keep input order
   */
  async analyzeVideoFrames(framePaths: string[], options: FrameAnalysisOptions = {}): Promise<SceneAnalysis[]> {
    const interval = options.frameInterval ?? DEFAULT_FRAME_INTERVAL_SECONDS;
    const analyses: SceneAnalysis[] = [];

    for (const [index, framePath] of framePaths.entries()) {
      analyses.push(await this.analyzeImage(framePath, {
        prompt: options.prompt,
        timestamp: index * interval,
      }));
    }

    return analyses;
  }

  async detectViralMoments(analyses: SceneAnalysis[], transcript?: string): Promise<ViralMoment[]> {
    const prompt = `${buildViralContext(analyses, transcript)}\n${VIRAL_INSTRUCTIONS}`;
    const content = await this.requestChat(this.textModel, prompt, 1000);
    const moments = parseViralMoments(content);

    console.log(`OpenAI viral moments: ${moments.length} from ${analyses.length} scenes`);
    return moments;
  }

  /**
   * Screen frames for broadcast compliance. A frame whose request fails is
   * logged and skipped.
   */
  async checkCompliance(framePaths: string[], transcript?: string): Promise<ComplianceIssue[]> {
    const prompt = transcript
      ? `${COMPLIANCE_PROMPT}\n\nTranscript excerpt: ${transcript.slice(0, TRANSCRIPT_EXCERPT_LENGTH)}`
      : COMPLIANCE_PROMPT;
    const issues: ComplianceIssue[] = [];

    for (const [index, framePath] of framePaths.entries()) {
      try {
        const content = await this.describeImage(framePath, prompt);
        issues.push(...parseComplianceIssues(content, index * DEFAULT_FRAME_INTERVAL_SECONDS));
      } catch (error) {
        console.warn('Frame compliance check failed', {
          frame: framePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return issues;
  }
}
