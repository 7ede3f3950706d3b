export type DownloadErrorType =
  'AUTH' |
  'PARSE' |
  'METADATA_FETCH' |
  'NO_SUITABLE_ENCODING' |
  'KEY' |
  'STREAM' |
  'DECRYPT' |
  'CONTAINER' |
  'WRITE' |
  'PATH_TEMPLATE' |
  'DIRECTORY_CREATION';

// These stop the whole run instead of a single track
const FATAL_TYPES: readonly DownloadErrorType[] = ['AUTH', 'PATH_TEMPLATE', 'DIRECTORY_CREATION'];

export default class DownloadError extends Error {
  type: DownloadErrorType;

  constructor(type: DownloadErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DownloadError';
    this.type = type;
  }

  get isFatal(): boolean {
    return FATAL_TYPES.includes(this.type);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
