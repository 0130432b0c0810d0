export type SiteAssessmentErrorCode =
  | 'NotFound'
  | 'ClassificationError'
  | 'CollaboratorTimeout'
  | 'IncompleteAssessment'
  | 'InputUnavailable'
  | 'InvalidResponse'
  | 'CollaboratorFailure';

export class SiteAssessmentError extends Error {
  readonly code: SiteAssessmentErrorCode;

  constructor(code: SiteAssessmentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends SiteAssessmentError {
  readonly location: string;

  constructor(location: string) {
    super('NotFound', `Location "${location}" could not be resolved.`);
    this.location = location;
  }
}

export class ClassificationError extends SiteAssessmentError {
  readonly imageRef: string;

  constructor(imageRef: string, message: string, options?: { cause?: unknown }) {
    super('ClassificationError', message, options);
    this.imageRef = imageRef;
  }
}

export class CollaboratorTimeoutError extends SiteAssessmentError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('CollaboratorTimeout', `${operation} did not respond within ${timeoutMs}ms.`);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class IncompleteAssessmentError extends SiteAssessmentError {
  readonly site: string;
  readonly stage: string;

  constructor(site: string, stage: string, reason: string) {
    super('IncompleteAssessment', `Assessment for ${site} is missing ${stage}: ${reason}`);
    this.site = site;
    this.stage = stage;
  }
}

export class InputUnavailableError extends SiteAssessmentError {
  constructor(message: string) {
    super('InputUnavailable', message);
  }
}

export class InvalidResponseError extends SiteAssessmentError {
  constructor(operation: string, issues: readonly string[]) {
    super('InvalidResponse', `${operation} returned an invalid payload: ${issues.join('; ')}`);
  }
}

export const isSiteAssessmentError = (error: unknown): error is SiteAssessmentError =>
  error instanceof SiteAssessmentError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
