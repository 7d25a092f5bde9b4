/**
 * Get Issue Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createIssueNotFoundError, type IssueError } from '../errors.js';

import type { IssuesRepository } from '../ports.js';
import type { NewsletterIssue } from '../types.js';

export interface GetIssueDeps {
  issuesRepo: IssuesRepository;
}

export async function getIssue(
  deps: GetIssueDeps,
  issueId: string
): Promise<Result<NewsletterIssue, IssueError>> {
  const result = await deps.issuesRepo.findIssue(issueId);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createIssueNotFoundError(issueId));
  }
  return ok(result.value);
}
