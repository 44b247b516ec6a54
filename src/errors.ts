/**
 * Error taxonomy for the review pipeline.
 *
 * Duplicate deliveries are not errors: the idempotency guard answers them with
 * a `drop` decision.
 */

export interface ErrorWithStatus extends Error {
  status?: number;
}

export class ReviewRelayError extends Error implements ErrorWithStatus {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = options?.status ?? 500;
  }
}

export class ConfigError extends ReviewRelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type DiffUnavailableReason = 'not-found' | 'unavailable';

/** Fatal to the job: no chunk is produced. */
export class DiffUnavailableError extends ReviewRelayError {
  readonly reason: DiffUnavailableReason;

  constructor(reason: DiffUnavailableReason, message: string, cause?: unknown) {
    super('DIFF_UNAVAILABLE', message, { status: 502, cause });
    this.reason = reason;
  }
}

export class ModelTransientError extends ReviewRelayError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_TRANSIENT', message, { status: 503, cause });
  }
}

export class ModelFatalError extends ReviewRelayError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_FATAL', message, { status: 502, cause });
  }
}

/** Every model call of a job failed; the job cannot produce a review. */
export class ModelExhaustedError extends ReviewRelayError {
  constructor(message: string) {
    super('MODEL_EXHAUSTED', message, { status: 502 });
  }
}

export class PostError extends ReviewRelayError {
  readonly transient: boolean;

  constructor(message: string, transient: boolean, cause?: unknown) {
    super('POST_FAILED', message, { status: 502, cause });
    this.transient = transient;
  }
}

/** The pull request mapping kept moving under admission; GitHub may redeliver. */
export class AdmissionContendedError extends ReviewRelayError {
  readonly deliveryId: string;

  constructor(deliveryId: string) {
    super('ADMISSION_CONTENDED', `Could not admit ${deliveryId}: active job kept changing`, { status: 503 });
    this.deliveryId = deliveryId;
  }
}

/** Cooperative cancellation signal raised at an ordinal boundary. */
export class SupersededJobError extends ReviewRelayError {
  readonly jobId: string;

  constructor(jobId: string, message = `Job ${jobId} is no longer active`) {
    super('JOB_SUPERSEDED', message, { status: 409 });
    this.jobId = jobId;
  }
}
