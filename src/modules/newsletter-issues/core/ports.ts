/**
 * Newsletter Issues Module - Ports
 */

import type { IssueError } from './errors.js';
import type { EnqueuedIssue, EnqueueIssueInput, NewsletterIssue } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Writes that run inside the idempotency transaction of a publish request.
 * Nothing done through a scope is visible until the response is saved.
 */
export interface PublishScope {
  listConfirmedSubscriberIds(): Promise<Result<string[], IssueError>>;

  /** Inserts the issue and one delivery task per distinct subscriber. */
  enqueueIssue(input: EnqueueIssueInput): Promise<Result<EnqueuedIssue, IssueError>>;
}

export interface IssuesRepository {
  /** Newest first */
  listIssues(): Promise<Result<NewsletterIssue[], IssueError>>;

  findIssue(issueId: string): Promise<Result<NewsletterIssue | null, IssueError>>;
}
