export {
  createBoundedQuery,
  type BoundedQueryOptions,
  type DecodedBoundedQueryOptions,
  type FetchMode,
} from './bounded-query.js';
export {
  createLiveQuery,
  type DecodedLiveQueryOptions,
  type LiveQueryOptions,
} from './live-query.js';
export {
  QueryStreams,
  type FetchStreamOptions,
  type QueryStreamsOptions,
} from './query-streams.js';
