import { randomUUID } from 'node:crypto';
import {
  isTerminalStatus,
  pullRequestKey,
  type PullRequestKey,
  type ReviewEvent,
  type ReviewJob,
} from '../../types.js';
import { AdmissionContendedError } from '../../errors.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { KeyedLock } from './keyed-lock.js';
import type { StateStore } from './state-store.js';

export type DropReason = 'duplicate-delivery' | 'same-head';

export type AdmitDecision =
  | { kind: 'accept'; jobId: string; job: ReviewJob }
  | { kind: 'drop'; reason: DropReason; jobId?: string }
  | { kind: 'supersede'; oldJobId: string; newJobId: string; job: ReviewJob };

export interface IdempotencyGuard {
  admit(event: ReviewEvent): Promise<AdmitDecision>;
  /** Clears the pull request mapping once `job` is terminal. */
  release(job: ReviewJob): Promise<boolean>;
  /** Marks the active job cancelled; used when the pull request closes. */
  cancel(key: PullRequestKey): Promise<ReviewJob | null>;
  /** True while the job exists and is not terminal. */
  isActive(jobId: string): Promise<boolean>;
  /** Lets a redelivery of an event whose job never reached the queue through again. */
  releaseDelivery(deliveryId: string): Promise<void>;
}

// Retries after losing the compare-and-set to another process
const MAX_SWAP_ATTEMPTS = 5;

export function createIdempotencyGuard(deps: {
  store: StateStore;
  logger: Logger;
  lock?: KeyedLock;
  newJobId?: () => string;
  now?: () => Date;
}): IdempotencyGuard {
  const { store, logger } = deps;
  const lock = deps.lock ?? new KeyedLock();
  const newJobId = deps.newJobId ?? randomUUID;
  const now = deps.now ?? (() => new Date());

  function createJob(event: ReviewEvent): ReviewJob {
    return {
      jobId: newJobId(),
      deliveryId: event.deliveryId,
      repositoryId: event.repositoryId,
      pullRequestNumber: event.pullRequestNumber,
      headCommitSha: event.headCommitSha,
      baseCommitSha: event.baseCommitSha,
      installationId: event.installationId,
      status: 'queued',
      createdAt: now().toISOString(),
      attemptCount: 0,
    };
  }

  async function admitLocked(event: ReviewEvent): Promise<AdmitDecision> {
    if (!(await store.claimDelivery(event.deliveryId))) {
      return { kind: 'drop', reason: 'duplicate-delivery' };
    }

    try {
      return await installJob(event);
    } catch (error) {
      await store.releaseDelivery(event.deliveryId);
      logger.warn('Admission failed, delivery released', { deliveryId: event.deliveryId, error: errorMessage(error) });
      throw error;
    }
  }

  async function installJob(event: ReviewEvent): Promise<AdmitDecision> {
    for (let attempt = 1; attempt <= MAX_SWAP_ATTEMPTS; attempt++) {
      const active = await store.getActiveJob(event);
      const live = active && !isTerminalStatus(active.status) ? active : null;

      if (live && live.headCommitSha === event.headCommitSha) {
        return { kind: 'drop', reason: 'same-head', jobId: live.jobId };
      }

      const job = createJob(event);
      if (await store.swapActiveJob(event, active?.jobId ?? null, job)) {
        return live
          ? { kind: 'supersede', oldJobId: live.jobId, newJobId: job.jobId, job }
          : { kind: 'accept', jobId: job.jobId, job };
      }

      logger.debug('Active job changed during admission, retrying', {
        pullRequest: pullRequestKey(event),
        attempt,
      });
    }

    throw new AdmissionContendedError(event.deliveryId);
  }

  async function admit(event: ReviewEvent): Promise<AdmitDecision> {
    const decision = await lock.run(pullRequestKey(event), () => admitLocked(event));

    logger.info('Admission decision', {
      deliveryId: event.deliveryId,
      pullRequest: pullRequestKey(event),
      headCommitSha: event.headCommitSha.substring(0, 7),
      decision: decision.kind,
      ...(decision.kind === 'drop' ? { reason: decision.reason } : {}),
      ...(decision.kind === 'supersede' ? { oldJobId: decision.oldJobId, newJobId: decision.newJobId } : {}),
      ...(decision.kind === 'accept' ? { jobId: decision.jobId } : {}),
    });

    return decision;
  }

  async function release(job: ReviewJob): Promise<boolean> {
    return lock.run(pullRequestKey(job), () => store.clearActiveJob(job, job.jobId));
  }

  async function cancel(key: PullRequestKey): Promise<ReviewJob | null> {
    return lock.run(pullRequestKey(key), async () => {
      const active = await store.getActiveJob(key);
      if (!active || isTerminalStatus(active.status)) return null;
      if (!(await store.finalizeJob(active.jobId, 'cancelled'))) return null;
      await store.clearActiveJob(key, active.jobId);
      logger.info('Cancelled active job', { pullRequest: pullRequestKey(key), jobId: active.jobId });
      return { ...active, status: 'cancelled' };
    });
  }

  async function isActive(jobId: string): Promise<boolean> {
    const job = await store.getJob(jobId);
    return job !== null && !isTerminalStatus(job.status);
  }

  async function releaseDelivery(deliveryId: string): Promise<void> {
    await store.releaseDelivery(deliveryId);
  }

  return { admit, release, cancel, isActive, releaseDelivery };
}
