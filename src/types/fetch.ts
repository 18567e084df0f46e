export type ErrorKind =
  | 'NetworkTransient'
  | 'NetworkFatal'
  | 'ParseMalformed'
  | 'ScopeRejected'
  | 'TaskTimeout';

export interface FetchResponse {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  headers: Record<string, string>;
  body: Buffer;
  redirectCount: number;
  fetchTime: number;
  attempts: number;
  cacheRef?: string;
}

export interface ContentStore {
  write(key: string, content: Buffer): Promise<string>;
}

export interface FetchRequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  cache?: ContentStore;
  cacheKey?: string;
}
