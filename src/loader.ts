import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ProtocolLoadError } from './errors.js';

/**
 * Package metadata endpoint giving the latest published protocol version
 */
export const LATEST_REF_URL = 'https://registry.npmjs.org/devtools-protocol/latest';

/**
 * Schema payloads read when no input is configured; `{ref}` is replaced by
 * the protocol version
 */
export const DEFAULT_SOURCES: readonly string[] = [
  'https://github.com/ChromeDevTools/devtools-protocol/raw/{ref}/json/browser_protocol.json',
  'https://github.com/ChromeDevTools/devtools-protocol/raw/{ref}/json/js_protocol.json',
];

const FETCH_TIMEOUT_MS = 10_000;

const PackageMetadataSchema = z.object({
  version: z.string().min(1),
});

type Fetch = typeof fetch;

/**
 * Checks if a string is an http(s) URL
 */
function isUrl(str: string): boolean {
  try {
    const url = new URL(str);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function reasonOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

async function fetchText(url: string, fetchImpl: Fetch): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
  } catch (error) {
    throw new ProtocolLoadError(url, reasonOf(error));
  }
  if (!response.ok) {
    throw new ProtocolLoadError(url, `${response.status} ${response.statusText}`);
  }
  return response.text();
}

function parseJson(source: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ProtocolLoadError(source, `invalid JSON: ${reasonOf(error)}`);
  }
}

/**
 * Looks up the latest published protocol version
 *
 * @param fetchImpl - Fetch implementation, the global one by default
 * @returns Version tag, e.g. `v0.0.1359167`
 */
export async function resolveLatestRef(fetchImpl: Fetch = fetch): Promise<string> {
  const content = await fetchText(LATEST_REF_URL, fetchImpl);
  const result = PackageMetadataSchema.safeParse(parseJson(LATEST_REF_URL, content));
  if (!result.success) {
    throw new ProtocolLoadError(LATEST_REF_URL, 'response has no version');
  }
  return `v${result.data.version}`;
}

/**
 * Substitutes the protocol version into a source template
 *
 * @example
 * expandSource('https://host/{ref}/browser_protocol.json', 'v1') // 'https://host/v1/browser_protocol.json'
 */
export function expandSource(source: string, ref: string): string {
  return source.split('{ref}').join(ref);
}

/**
 * Loads one protocol payload from a URL or a local file
 *
 * @param source - URL or file path
 * @param fetchImpl - Fetch implementation used for URLs
 * @returns Decoded JSON, not yet validated
 */
export async function loadProtocol(source: string, fetchImpl: Fetch = fetch): Promise<unknown> {
  if (isUrl(source)) {
    return parseJson(source, await fetchText(source, fetchImpl));
  }

  let content: string;
  try {
    content = await readFile(source, 'utf-8');
  } catch (error) {
    throw new ProtocolLoadError(source, reasonOf(error));
  }
  return parseJson(source, content);
}
