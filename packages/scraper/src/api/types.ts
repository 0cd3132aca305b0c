/** Opaque continuation token. `null` requests the first page. */
export type Cursor = string;

export interface ScrapedRecord {
  id: string;
  timestamp: Date;
}

export interface Post extends ScrapedRecord {
  screenName: string;
  username: string;
  userId: string;
  text: string;
  url: string; // permalink path
  replies: number;
  reposts: number;
  likes: number;
  isReply: boolean;
}

export interface Profile {
  screenName: string;
  fullName: string;
  bio: string;
  location: string;
  joinDate: string;
  posts: number;
  following: number;
  followers: number;
  likes: number;
}

export interface PageRequest {
  query: string;
  lang: string;
  cursor: Cursor | null;
  fromUser: boolean;
}

export interface PageResult<T extends ScrapedRecord> {
  records: T[];
  cursor: Cursor | null; // id of the last record, not the upstream token
}

/** Continuation responses wrap the page HTML in this JSON shape. */
export interface PageEnvelope {
  itemsHtml: string;
  minPosition: Cursor | null;
}

export interface PageFetcher {
  fetchPage(url: string, signal?: AbortSignal): Promise<string>;
}

export interface PageParser<T extends ScrapedRecord> {
  parseRecords(html: string): T[];
  parseProfile(html: string): Profile | null;
}

export interface FetcherConfig {
  userAgent: string;
  timeoutMs?: number;
}

/** Everything one scrape run needs; shared read-only by every worker. */
export interface ScrapeContext<T extends ScrapedRecord> {
  fetcher: PageFetcher;
  parser: PageParser<T>;
  baseUrl: string;
  retries: number;
  signal?: AbortSignal;
}
