import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import {
  parseSceneAnalysisInput,
  serializeComplianceIssue,
  serializeSceneAnalysis,
  serializeViralMoment,
  serializeVoice,
} from '../lib/serializers';
import type { SceneAnalysis } from '../providers/types';

describe('wire serializers', () => {
  test('scene analyses read back from their serialized form', () => {
    const analysis: SceneAnalysis = {
      timestamp: 5,
      description: 'Wide shot of repair trucks',
      emotions: ['dramatic'],
      objects: ['truck'],
      peopleCount: 3,
      textDetected: ['LIVE'],
      confidence: 0.9,
      tags: ['news'],
    };

    const serialized = serializeSceneAnalysis(analysis);

    assert.equal(serialized.people_count, 3);
    assert.deepEqual(serialized.text_detected, ['LIVE']);
    assert.deepEqual(parseSceneAnalysisInput(serialized), analysis);
  });

  test('scene input needs a timestamp and description', () => {
    assert.equal(parseSceneAnalysisInput({ description: 'x' }), undefined);
    assert.equal(parseSceneAnalysisInput({ timestamp: '3', description: 'x' }), undefined);
    assert.equal(parseSceneAnalysisInput(['x']), undefined);
    assert.deepEqual(parseSceneAnalysisInput({ timestamp: 3, description: 'x' }), {
      timestamp: 3,
      description: 'x',
      emotions: [],
      objects: [],
      peopleCount: 0,
      textDetected: [],
      confidence: 1,
      tags: [],
    });
  });

  test('viral moments use start/end and hashtags', () => {
    assert.deepEqual(serializeViralMoment({
      startTime: 1,
      endTime: 4,
      title: 'Cheer',
      description: 'Crowd cheers',
      viralScore: 0.8,
      emotion: 'joy',
      reasoning: 'Relief',
      suggestedHashtags: ['#Cheer'],
      platforms: ['TikTok'],
    }), {
      start: 1,
      end: 4,
      title: 'Cheer',
      description: 'Crowd cheers',
      viral_score: 0.8,
      emotion: 'joy',
      reasoning: 'Relief',
      hashtags: ['#Cheer'],
      platforms: ['TikTok'],
    });
  });

  test('compliance issues expose their type', () => {
    const serialized = serializeComplianceIssue({
      timestamp: 2,
      issueType: 'violence',
      severity: 'high',
      description: 'Fight',
      confidence: 0.7,
      recommendation: 'Cut',
    });

    assert.equal(serialized.type, 'violence');
    assert.equal(serialized.severity, 'high');
  });

  test('voices expose voice_id and a nullable preview', () => {
    assert.deepEqual(serializeVoice({ id: 'v1', name: 'Sam', language: 'en', description: '', labels: {} }), {
      voice_id: 'v1',
      name: 'Sam',
      language: 'en',
      description: '',
      preview_url: null,
      labels: {},
    });
  });
});
