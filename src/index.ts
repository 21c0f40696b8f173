export { createApp } from './app';
export {
  loadSettings,
  type ElevenLabsConfig,
  type MockConfig,
  type Settings,
  type VisionConfig,
  type WhisperConfig,
} from './lib/config';
export {
  parseSceneAnalysisInput,
  serializeComplianceIssue,
  serializeSceneAnalysis,
  serializeViralMoment,
  serializeVoice,
} from './lib/serializers';
export { ConfigurationError, MediaNotFoundError, ProviderError } from './lib/errors';
export { formatSrtTimestamp, formatTimestamp, formatVttTimestamp, type SubtitleFormat } from './lib/timestamps';
export {
  confidenceFromLogProb,
  createSegment,
  joinSegmentText,
  renderSubtitles,
  resolveDuration,
  serializeTranscription,
  toPlainText,
  toSrt,
  toVtt,
  type TranscriptSegment,
  type TranscriptionResult,
  type WordTiming,
} from './lib/transcript';
export { createServices } from './providers';
export { ElevenLabsDubbingService } from './providers/elevenlabs';
export { MockDubbingService } from './providers/mock-dubbing';
export { MockTranscriptionService } from './providers/mock-transcription';
export { MockVisionService } from './providers/mock-vision';
export { OpenAIVisionService } from './providers/openai-vision';
export { WhisperTranscriptionService, parseWhisperResponse } from './providers/whisper';
export type * from './providers/types';
