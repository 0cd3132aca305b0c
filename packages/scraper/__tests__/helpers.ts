import { TransportError } from '../src/api/client';
import { HtmlPageParser } from '../src/parse/html';
import type { PageFetcher, Post, ScrapeContext } from '../src/api/types';

export const BASE_URL = 'https://example.test';

export interface Item {
  id: string;
  time: number; // unix seconds
}

export function item(id: string, time: number): Item {
  return { id, time };
}

export function streamHtml(items: Item[]): string {
  const lis = items.map(({ id, time }) =>
    `<li class="js-stream-item" data-item-id="${id}">`
    + `<div class="tweet" data-tweet-id="${id}" data-screen-name="alice" data-name="Alice" data-user-id="42" data-permalink-path="/alice/status/${id}">`
    + `<span class="_timestamp" data-time="${time}"></span>`
    + `<p class="tweet-text">post ${id}</p>`
    + '</div></li>'
  );
  return `<ol class="stream-items">${lis.join('')}</ol>`;
}

export function envelope(items: Item[], minPosition: string | null = null): string {
  return JSON.stringify({
    items_html: items.length > 0 ? streamHtml(items) : '',
    min_position: minPosition,
    has_more_items: items.length > 0,
  });
}

type Respond = (url: string, call: number) => string | Promise<string>;

/** In-process stand-in for the HTTP fetcher; records every URL it is asked for. */
export class ScriptedFetcher implements PageFetcher {
  readonly urls: string[] = [];

  constructor(private readonly respond: Respond) {}

  async fetchPage(url: string): Promise<string> {
    const call = this.urls.length;
    this.urls.push(url);
    return this.respond(url, call);
  }
}

export function failingFetcher(): ScriptedFetcher {
  return new ScriptedFetcher((url) => {
    throw new TransportError(url, 503);
  });
}

/** Answers calls in order, repeating the last response once the script runs out. */
export function sequenceFetcher(responses: string[]): ScriptedFetcher {
  return new ScriptedFetcher((_, call) => responses[Math.min(call, responses.length - 1)]);
}

export function makeContext(
  fetcher: PageFetcher,
  overrides: Partial<ScrapeContext<Post>> = {}
): ScrapeContext<Post> {
  return {
    fetcher,
    parser: new HtmlPageParser(),
    baseUrl: BASE_URL,
    retries: 3,
    ...overrides,
  };
}

export function ids(records: { id: string }[]): string[] {
  return records.map((r) => r.id);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
