/**
 * Renderer contract: load a URL and hand back what the page became.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { RequestConfig } from './request-config.js';

export interface RenderRequest {
  url: string;
  config: RequestConfig;
  /** Base file name for an optional screenshot, without extension. */
  screenshotName: string;
  signal?: AbortSignal;
}

export interface RenderResult {
  /** URL after redirects. */
  finalUrl: string;
  html: string;
  screenshotUri: string | null;
}

export interface Renderer {
  readonly name: string;
  render(request: RenderRequest): Promise<RenderResult>;
}

export const WAIT_UNTIL_STATES = ['load', 'domcontentloaded', 'networkidle', 'commit'] as const;
export type WaitUntilState = (typeof WAIT_UNTIL_STATES)[number];

const WAIT_UNTIL_ALIASES: Record<string, WaitUntilState> = {
  networkidle0: 'networkidle',
  networkidle2: 'networkidle',
};

/**
 * Map a free-form wait-until value onto a navigation lifecycle event.
 * Unknown values fall back to `domcontentloaded`.
 */
export function toWaitUntil(value: string): WaitUntilState {
  const normalized = value.trim().toLowerCase();
  return WAIT_UNTIL_STATES.find((state) => state === normalized) ?? WAIT_UNTIL_ALIASES[normalized] ?? 'domcontentloaded';
}

export function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Wait `ms` milliseconds unless `signal` fires first. Non-positive waits return at once.
 */
export async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, signal ? { signal } : {});
}
