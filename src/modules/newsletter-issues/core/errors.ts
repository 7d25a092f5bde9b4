/**
 * Newsletter Issues Module - Domain Errors
 */

import { IDEMPOTENCY_ERROR_HTTP_STATUS, type IdempotencyError } from '../../idempotency/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type IssueField = 'title' | 'textContent' | 'htmlContent';

export interface IssueValidationError {
  readonly type: 'IssueValidationError';
  readonly field: IssueField;
  readonly message: string;
}

export interface IssueNotFoundError {
  readonly type: 'IssueNotFoundError';
  readonly message: string;
  readonly issueId: string;
}

export interface IssuesDatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly cause?: unknown;
}

export type IssueError = IssueValidationError | IssueNotFoundError | IssuesDatabaseError;

/**
 * Everything publishing can fail with.
 */
export type PublishIssueError = IssueError | IdempotencyError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createIssueValidationError = (
  field: IssueField,
  message: string
): IssueValidationError => ({
  type: 'IssueValidationError',
  field,
  message,
});

export const createIssueNotFoundError = (issueId: string): IssueNotFoundError => ({
  type: 'IssueNotFoundError',
  message: `Newsletter issue not found: ${issueId}`,
  issueId,
});

export const createDatabaseError = (message: string, cause?: unknown): IssuesDatabaseError => ({
  type: 'DatabaseError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const ISSUE_ERROR_HTTP_STATUS: Record<PublishIssueError['type'], number> = {
  ...IDEMPOTENCY_ERROR_HTTP_STATUS,
  IssueValidationError: 400,
  IssueNotFoundError: 404,
  DatabaseError: 500,
};

export const getHttpStatusForError = (error: PublishIssueError): number =>
  ISSUE_ERROR_HTTP_STATUS[error.type];
