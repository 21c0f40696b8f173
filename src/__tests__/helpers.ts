import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { mock } from 'node:test';
import { isRecord } from '../lib/utils';

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

/**
 * Replace global fetch for the current test; restore with mock.restoreAll()
 */
export function stubFetch(
  respond: (url: string, init: RequestInit | undefined, callIndex: number) => Response | Promise<Response>
): RecordedRequest[] {
  const calls: RecordedRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    return respond(url, init, calls.length - 1);
  });
  return calls;
}

export function jsonReply(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function chatReply(content: string): Response {
  return jsonReply({ choices: [{ message: { role: 'assistant', content } }] });
}

export function requestHeader(request: RecordedRequest, name: string): string | null {
  return new Headers(request.init?.headers).get(name);
}

export function formBody(request: RecordedRequest): FormData {
  const body = request.init?.body;
  if (!(body instanceof FormData)) {
    throw new Error(`expected FormData body for ${request.url}`);
  }
  return body;
}

export function jsonBody(request: RecordedRequest): Record<string, unknown> {
  const body = request.init?.body;
  if (typeof body !== 'string') {
    throw new Error(`expected JSON string body for ${request.url}`);
  }
  const parsed: unknown = JSON.parse(body);
  if (!isRecord(parsed)) {
    throw new Error('expected a JSON object');
  }
  return parsed;
}

export interface TempDir {
  dir: string;
  write(name: string, contents: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(tmpdir(), 'media-ai-'));
  return {
    dir,
    async write(name, contents) {
      const filePath = path.join(dir, name);
      await writeFile(filePath, contents);
      return filePath;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
