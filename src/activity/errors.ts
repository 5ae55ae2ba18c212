export type ActivityLogErrorCode =
  | 'NotFound'
  | 'ParseFailure'
  | 'IOFailure'
  | 'OutOfRange'
  | 'StaleRevision';

export interface ActivityLogErrorDetails {
  filePath?: string
  row?: number
  raw?: string
  positions?: number[]
  expectedRevision?: string
  actualRevision?: string
}

export class ActivityLogError extends Error {
  readonly code: ActivityLogErrorCode;
  readonly details: ActivityLogErrorDetails;

  constructor (code: ActivityLogErrorCode, message: string, details: ActivityLogErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActivityLogError';
    this.code = code;
    this.details = details;
  }
}

export const isActivityLogError = (error: unknown): error is ActivityLogError => error instanceof ActivityLogError;
