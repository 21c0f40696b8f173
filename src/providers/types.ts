import type { TranscriptionResult } from '../lib/transcript';

export type ServiceMode = 'live' | 'mock';

// =============================================================================
// TRANSCRIPTION
// =============================================================================

export interface TranscribeOptions {
  /** ISO language code; auto-detect when omitted */
  language?: string;
  /** Vocabulary / style hint passed to the model */
  prompt?: string;
  /** Upload file name for in-memory audio (default: audio.<ext>) */
  filename?: string;
  /** Content type for in-memory audio (default: audio/mpeg) */
  contentType?: string;
}

export interface TranscriptionService {
  transcribe(filePath: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
  transcribeUrl(url: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
  transcribeAudio(audio: ArrayBuffer | Uint8Array, options?: TranscribeOptions): Promise<TranscriptionResult>;
}

// =============================================================================
// DUBBING / TTS
// =============================================================================

export interface Voice {
  id: string;
  name: string;
  language: string;
  description: string;
  previewUrl?: string;
  labels: Record<string, string>;
}

export interface SpeechOptions {
  voiceId?: string;
  modelId?: string;
  /** 0-1 (default: 0.5) */
  stability?: number;
  /** 0-1 (default: 0.75) */
  similarityBoost?: number;
}

export interface SpeechResult {
  audio: Buffer;
  format: 'mp3';
  /** Seconds; 0 when the provider does not report it */
  duration: number;
  metadata: Record<string, unknown>;
}

export interface DubOptions {
  voiceId?: string;
  /** default: en */
  sourceLanguage?: string;
}

export interface DubbingResult {
  audioPath: string;
  language: string;
  voiceId: string;
  duration: number;
  metadata: Record<string, unknown>;
}

export interface DubbingService {
  getVoices(language?: string): Promise<Voice[]>;
  textToSpeech(text: string, options?: SpeechOptions): Promise<SpeechResult>;
  dubAudio(audioPath: string, targetLanguage: string, options?: DubOptions): Promise<DubbingResult>;
  cloneVoice(name: string, audioPaths: string[], description?: string): Promise<Voice>;
}

// =============================================================================
// VISION
// =============================================================================

export interface SceneAnalysis {
  timestamp: number;
  description: string;
  emotions: string[];
  objects: string[];
  peopleCount: number;
  textDetected: string[];
  confidence: number;
  tags: string[];
}

export interface ViralMoment {
  startTime: number;
  endTime: number;
  title: string;
  description: string;
  /** 0-1 */
  viralScore: number;
  emotion: string;
  reasoning: string;
  suggestedHashtags: string[];
  platforms: string[];
}

export type ComplianceSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ComplianceIssue {
  timestamp: number;
  /** profanity, violence, adult_content, ... */
  issueType: string;
  severity: ComplianceSeverity;
  description: string;
  confidence: number;
  recommendation: string;
}

export interface ImageAnalysisOptions {
  prompt?: string;
  /** Offset of the frame within its video, in seconds (default: 0) */
  timestamp?: number;
}

export interface FrameAnalysisOptions {
  prompt?: string;
  /** Seconds between consecutive frames (default: 1) */
  frameInterval?: number;
}

export interface VisionService {
  analyzeImage(imagePath: string, options?: ImageAnalysisOptions): Promise<SceneAnalysis>;
  analyzeVideoFrames(framePaths: string[], options?: FrameAnalysisOptions): Promise<SceneAnalysis[]>;
  detectViralMoments(analyses: SceneAnalysis[], transcript?: string): Promise<ViralMoment[]>;
  checkCompliance(framePaths: string[], transcript?: string): Promise<ComplianceIssue[]>;
}

export interface AiServices {
  mode: ServiceMode;
  transcription: TranscriptionService;
  dubbing: DubbingService;
  vision: VisionService;
}
