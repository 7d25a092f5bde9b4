import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// pg returns jsonb already parsed; writes go through JSON.stringify
export type JsonColumn = ColumnType<unknown, string | null, string | null>;

export type SubscriptionStatusColumn = 'pending_confirmation' | 'confirmed';

// Subscriptions Table
export interface Subscriptions {
  id: string; // UUID
  email: string;
  name: string;
  subscribed_at: ColumnType<Date, Date | string | undefined, Date | string>;
  status: SubscriptionStatusColumn;
}

// Subscription Tokens Table
export interface SubscriptionTokens {
  subscription_token: string;
  subscriber_id: string; // UUID
}

// Newsletter Issues Table
export interface NewsletterIssues {
  issue_id: string; // UUID
  title: string;
  text_content: string;
  html_content: string;
  published_at: ColumnType<Date, Date | string | undefined, Date | string>;
  subscribers_at_publish: Generated<number>;
  delivered_count: Generated<number>;
  failed_count: Generated<number>;
}

// Issue Delivery Queue Table
// One row per unresolved (issue, subscriber) send obligation.
export interface IssueDeliveryQueue {
  issue_id: string; // UUID
  subscriber_id: string; // UUID
  retry_count: Generated<number>;
  execute_after: ColumnType<Date, Date | string | undefined, Date | string>;
}

// Idempotency Table
// A row without response_status is still being processed by the request that inserted it.
export interface Idempotency {
  user_id: string;
  idempotency_key: string; // UUID
  response_status: number | null;
  response_headers: JsonColumn;
  response_body: string | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface NewsletterDatabase {
  subscriptions: Subscriptions;
  subscription_tokens: SubscriptionTokens;
  newsletter_issues: NewsletterIssues;
  issue_delivery_queue: IssueDeliveryQueue;
  idempotency: Idempotency;
}
