/**
 * List Issues Use Case
 */

import type { IssueError } from '../errors.js';
import type { IssuesRepository } from '../ports.js';
import type { NewsletterIssue } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListIssuesDeps {
  issuesRepo: IssuesRepository;
}

/**
 * Every published issue with its delivery counters, newest first.
 */
export async function listIssues(
  deps: ListIssuesDeps
): Promise<Result<NewsletterIssue[], IssueError>> {
  return deps.issuesRepo.listIssues();
}
