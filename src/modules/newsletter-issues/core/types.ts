/**
 * Newsletter Issues Module - Domain Types
 */

export interface IssueContentInput {
  readonly title: string;
  readonly htmlContent: string;
  readonly textContent: string;
}

export interface EnqueueIssueInput extends IssueContentInput {
  readonly subscriberIds: readonly string[];
}

export interface EnqueuedIssue {
  readonly issueId: string;
  /** Delivery tasks created, one per distinct confirmed subscriber */
  readonly subscribersAtPublish: number;
}

/**
 * An issue as shown in the delivery overview.
 */
export interface NewsletterIssue {
  readonly issueId: string;
  readonly title: string;
  readonly htmlContent: string;
  readonly textContent: string;
  readonly publishedAt: Date;
  readonly subscribersAtPublish: number;
  readonly deliveredCount: number;
  readonly failedCount: number;
}

export const ISSUE_ACCEPTED_MESSAGE =
  'The newsletter issue has been accepted - emails will go out shortly.';

/**
 * Deliveries neither delivered nor failed yet.
 */
export const pendingDeliveries = (issue: NewsletterIssue): number =>
  Math.max(0, issue.subscribersAtPublish - issue.deliveredCount - issue.failedCount);
