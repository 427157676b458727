import { request } from 'undici';
import { TransientIoError } from '../utils/errors.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'gridiron-pickem/0.1',
  Accept: 'application/json,text/csv,text/plain;q=0.9,*/*;q=0.8',
};

async function get(url: string, operation: string) {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: DEFAULT_HEADERS,
    maxRedirections: 3,
    headersTimeout: 15000,
    bodyTimeout: 30000,
  }).catch((err: unknown) => {
    throw new TransientIoError(operation, err instanceof Error ? err.message : String(err));
  });

  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new TransientIoError(operation, `HTTP ${statusCode} for ${url}`, statusCode);
  }
  return body;
}

export async function fetchText(url: string, operation: string): Promise<string> {
  const body = await get(url, operation);
  return body.text();
}

export async function fetchJson(url: string, operation: string): Promise<unknown> {
  const body = await get(url, operation);
  return body.json();
}

export async function fetchBytes(url: string, operation: string): Promise<Buffer> {
  const body = await get(url, operation);
  return Buffer.from(await body.arrayBuffer());
}
