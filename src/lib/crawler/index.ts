import * as cheerio from 'cheerio';
import { env } from '../env';
import { DEVICE_PROFILES, DeviceType, PageCapture } from '../types';
import { isBlockedTarget } from './target-guard';

export const MAX_REDIRECTS = 5;

export const BLOCKED_TARGET_MESSAGE = 'This URL points to a private/internal network target and cannot be analyzed.';

export class CaptureError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'CaptureError';
  }
}

/** Throws when the URL would reach loopback, a private network or a non-HTTP scheme. */
export async function assertPublicTarget(url: string): Promise<void> {
  if (await isBlockedTarget(new URL(url))) {
    throw new CaptureError(BLOCKED_TARGET_MESSAGE, url);
  }
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

export async function capturePage(
  url: string,
  deviceType: DeviceType,
  timeoutMs: number = env.captureTimeoutMs,
): Promise<PageCapture> {
  const profile = DEVICE_PROFILES[deviceType];
  const start = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let currentUrl = url;
  let response: Response;
  let html: string;
  try {
    // Redirects are followed by hand so every hop passes the target check.
    for (let hop = 0; ; hop++) {
      await assertPublicTarget(currentUrl);
      response = await fetch(currentUrl, {
        headers: {
          'User-Agent': profile.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        signal: controller.signal,
        redirect: 'manual',
      });

      const location = response.headers.get('location');
      if (!isRedirect(response.status) || !location) break;

      await response.body?.cancel();
      if (hop === MAX_REDIRECTS) {
        throw new CaptureError(`Failed to fetch ${url}: more than ${MAX_REDIRECTS} redirects`, url, response.status);
      }
      currentUrl = new URL(location, currentUrl).toString();
    }
    html = await response.text();
  } catch (error) {
    if (error instanceof CaptureError) throw error;
    if (controller.signal.aborted) {
      throw new CaptureError(`Capturing ${url} timed out after ${timeoutMs}ms`, url);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CaptureError(`Failed to fetch ${url}: ${reason}`, url);
  } finally {
    clearTimeout(timeout);
  }

  if (response.status >= 400) {
    throw new CaptureError(`Failed to fetch ${currentUrl}: HTTP ${response.status}`, currentUrl, response.status);
  }

  const $ = cheerio.load(html);
  const title = $('title').first().text().trim() || currentUrl;

  return {
    url: currentUrl,
    html,
    title,
    statusCode: response.status,
    deviceType,
    viewport: { ...profile.viewport },
    loadTime: Date.now() - start,
  };
}
