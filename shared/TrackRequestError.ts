export type TrackRequestErrorType =
  'INVALID_REFERENCE' |
  'UPSTREAM_UNAVAILABLE' |
  'NOT_FOUND' |
  'DOWNLOAD_FAILED' |
  'TRANSCODE_FAILED' |
  'STORAGE_FULL' |
  'REQUEST_CANCELLED';

/**
 * Message shown to the requester for each failure type.
 * The transport only ever looks at `type`, never at the cause.
 */
export const USER_MESSAGES: Record<TrackRequestErrorType, string> = {
  INVALID_REFERENCE: "That doesn't look like a Spotify track link.",
  UPSTREAM_UNAVAILABLE: 'Spotify is not answering right now, try again in a minute.',
  NOT_FOUND: "Couldn't find a matching audio source for that track.",
  DOWNLOAD_FAILED: 'Downloading the track failed, try again later.',
  TRANSCODE_FAILED: 'The downloaded audio could not be processed.',
  STORAGE_FULL: 'The track library is out of space, ask an admin to check the storage limit.',
  REQUEST_CANCELLED: 'The request was cancelled.',
};

interface TrackRequestErrorOptions {
  retryable?: boolean,
  cause?: unknown,
}

export default class TrackRequestError extends Error {
  type: TrackRequestErrorType;
  retryable: boolean;

  constructor(
    type: TrackRequestErrorType = 'DOWNLOAD_FAILED',
    message?: string,
    options: TrackRequestErrorOptions = {},
  ) {
    super(message ?? type, { cause: options.cause });
    this.name = 'TrackRequestError';
    this.type = type;
    this.retryable = options.retryable ?? false;
  }

  get userMessage() {
    return USER_MESSAGES[this.type];
  }
}

export function isTrackRequestError(err: unknown, type?: TrackRequestErrorType): err is TrackRequestError {
  return err instanceof TrackRequestError && (!type || err.type === type);
}

// Anything that is not already typed becomes `fallback`, keeping the original as the cause
export function toTrackRequestError(err: unknown, fallback: TrackRequestErrorType): TrackRequestError {
  if (err instanceof TrackRequestError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TrackRequestError(fallback, message, { cause: err });
}
