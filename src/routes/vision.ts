// VISION ROUTE
// POST /vision/viral-moments - rank scene analyses by viral potential

import type { Context } from 'hono';
import { errorResponse, invalidContentTypeResponse, invalidJsonResponse, missingFieldResponse } from '../lib/responses';
import { parseSceneAnalysisInput, serializeViralMoment } from '../lib/serializers';
import { isRecord, readString } from '../lib/utils';
import type { SceneAnalysis, VisionService } from '../providers/types';

export function viralMomentsRoute(service: VisionService) {
  return async (c: Context): Promise<Response> => {
    const contentType = c.req.header('Content-Type') || '';
    if (!contentType.includes('application/json')) {
      return invalidContentTypeResponse('application/json', contentType);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return invalidJsonResponse();
    }
    const rawScenes: unknown = isRecord(body) ? body['scenes'] : undefined;
    if (!isRecord(body) || !Array.isArray(rawScenes)) {
      return missingFieldResponse('scenes');
    }

    const scenes: SceneAnalysis[] = [];
    for (const [index, raw] of rawScenes.entries()) {
      const scene = parseSceneAnalysisInput(raw);
      if (!scene) {
        return errorResponse(400, 'Invalid scene', `scenes[${index}] must include numeric "timestamp" and "description"`);
      }
      scenes.push(scene);
    }

    const moments = await service.detectViralMoments(scenes, readString(body, 'transcript'));
    return c.json({ moments: moments.map(serializeViralMoment) });
  };
}
