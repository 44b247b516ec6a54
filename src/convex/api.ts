import { makeFunctionReference } from 'convex/server';

/**
 * References to the review-state functions of the Convex deployment used in
 * durable mode. Rows use null for absent values.
 */

export type ConvexJob = {
  jobId: string;
  deliveryId: string;
  repositoryId: string;
  pullRequestNumber: number;
  headCommitSha: string;
  baseCommitSha: string | null;
  installationId: number | null;
  status: string;
  createdAt: string;
  attemptCount: number;
  error: string | null;
};

export type ConvexChunk = {
  chunkId: string;
  jobId: string;
  ordinal: number;
  filePath: string | null;
  hunkRange: { first: number; last: number } | null;
  tokenEstimate: number;
};

export type ConvexComment = {
  jobId: string;
  findingRef: string;
  externalCommentId: string | null;
  postStatus: string;
  error: string | null;
};

export const api = {
  reviewState: {
    claimDelivery: makeFunctionReference<'mutation', { deliveryId: string; claimedAt: string }, boolean>(
      'reviewState:claimDelivery'
    ),
    releaseDelivery: makeFunctionReference<'mutation', { deliveryId: string }, null>('reviewState:releaseDelivery'),
    getActiveJob: makeFunctionReference<'query', { prKey: string }, ConvexJob | null>('reviewState:getActiveJob'),
    swapActiveJob: makeFunctionReference<
      'mutation',
      { prKey: string; expectedJobId: string | null; job: ConvexJob },
      boolean
    >('reviewState:swapActiveJob'),
    clearActiveJob: makeFunctionReference<'mutation', { prKey: string; jobId: string }, boolean>(
      'reviewState:clearActiveJob'
    ),
    getJob: makeFunctionReference<'query', { jobId: string }, ConvexJob | null>('reviewState:getJob'),
    updateJobStatus: makeFunctionReference<'mutation', { jobId: string; status: string }, boolean>(
      'reviewState:updateJobStatus'
    ),
    incrementAttempt: makeFunctionReference<'mutation', { jobId: string }, number>('reviewState:incrementAttempt'),
    finalizeJob: makeFunctionReference<
      'mutation',
      { jobId: string; status: string; error: string | null },
      boolean
    >('reviewState:finalizeJob'),
    saveChunks: makeFunctionReference<'mutation', { chunks: ConvexChunk[] }, null>('reviewState:saveChunks'),
    listChunks: makeFunctionReference<'query', { jobId: string }, ConvexChunk[]>('reviewState:listChunks'),
    getComment: makeFunctionReference<'query', { jobId: string; findingRef: string }, ConvexComment | null>(
      'reviewState:getComment'
    ),
    saveComment: makeFunctionReference<'mutation', { comment: ConvexComment }, null>('reviewState:saveComment'),
    listComments: makeFunctionReference<'query', { jobId: string }, ConvexComment[]>('reviewState:listComments'),
    discardArtifacts: makeFunctionReference<'mutation', { jobId: string }, null>('reviewState:discardArtifacts'),
  },
};
