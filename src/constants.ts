export const DEFAULT_REFRESH_INTERVAL_MS = 2000;
export const DEFAULT_WAIT_FIRST_RESPONSE = true;
export const POLL_JITTER_PCT = 0.1;
export const TOGGLES_ENDPOINT = 'api/server-sdk/toggles';
export const EVENTS_ENDPOINT = 'api/events';
// size of the bucket space percentage splits are expressed in (10000 = 0.01% granularity)
export const BUCKET_SIZE = 10000;
export const NOT_EXIST_REASON = 'not exist';
export const TYPE_MISMATCH_REASON = 'Value type mismatch';
