export { HttpMirrorFetcher } from './mirror-fetcher.js';
export type {
  MirrorFetcher,
  FetchOutcome,
  FetchProgressCallback,
  FetchImpl,
  HttpMirrorFetcherOptions,
} from './mirror-fetcher.js';
