// WIRE SERIALIZERS
// snake_case JSON shapes returned by the HTTP surface, and scene input parsing

import type { ComplianceIssue, SceneAnalysis, ViralMoment, Voice } from '../providers/types';
import { isRecord, readNumber, readString, readStringArray } from './utils';

export function serializeVoice(voice: Voice) {
  return {
    voice_id: voice.id,
    name: voice.name,
    language: voice.language,
    description: voice.description,
    preview_url: voice.previewUrl ?? null,
    labels: { ...voice.labels },
  };
}

export function serializeSceneAnalysis(analysis: SceneAnalysis) {
  return {
    timestamp: analysis.timestamp,
    description: analysis.description,
    emotions: [...analysis.emotions],
    objects: [...analysis.objects],
    people_count: analysis.peopleCount,
    text_detected: [...analysis.textDetected],
    confidence: analysis.confidence,
    tags: [...analysis.tags],
  };
}

export function serializeViralMoment(moment: ViralMoment) {
  return {
    start: moment.startTime,
    end: moment.endTime,
    title: moment.title,
    description: moment.description,
    viral_score: moment.viralScore,
    emotion: moment.emotion,
    reasoning: moment.reasoning,
    hashtags: [...moment.suggestedHashtags],
    platforms: [...moment.platforms],
  };
}

export function serializeComplianceIssue(issue: ComplianceIssue) {
  return {
    timestamp: issue.timestamp,
    type: issue.issueType,
    severity: issue.severity,
    description: issue.description,
    confidence: issue.confidence,
    recommendation: issue.recommendation,
  };
}

/**
 * Read a scene from its serialized form. Returns undefined unless `value`
 * carries a numeric timestamp and a description.
 */
export function parseSceneAnalysisInput(value: unknown): SceneAnalysis | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const timestamp = readNumber(value, 'timestamp');
  const description = readString(value, 'description');
  if (timestamp === undefined || description === undefined) {
    return undefined;
  }

  return {
    timestamp,
    description,
    emotions: readStringArray(value, 'emotions'),
    objects: readStringArray(value, 'objects'),
    peopleCount: readNumber(value, 'people_count') ?? 0,
    textDetected: readStringArray(value, 'text_detected'),
    confidence: readNumber(value, 'confidence') ?? 1.0,
    tags: readStringArray(value, 'tags'),
  };
}
