import { describe, expect, it } from 'vitest';

import { getIssue, listIssues } from '@/modules/newsletter-issues/index.js';

import { createTestIssue } from '../../fixtures/builders.js';
import { createNewsletterStore, makeFakeIssuesRepo } from '../../fixtures/fakes.js';

describe('listIssues', () => {
  it('returns issues newest first', async () => {
    const store = createNewsletterStore();
    store.issues.set('old', createTestIssue({ issueId: 'old', publishedAt: new Date('2026-01-01T00:00:00Z') }));
    store.issues.set('new', createTestIssue({ issueId: 'new', publishedAt: new Date('2026-02-01T00:00:00Z') }));

    const issues = (await listIssues({ issuesRepo: makeFakeIssuesRepo(store) }))._unsafeUnwrap();

    expect(issues.map((issue) => issue.issueId)).toEqual(['new', 'old']);
  });
});

describe('getIssue', () => {
  it('returns the issue', async () => {
    const store = createNewsletterStore();
    store.issues.set('issue-1', createTestIssue());

    const issue = (await getIssue({ issuesRepo: makeFakeIssuesRepo(store) }, 'issue-1'))._unsafeUnwrap();

    expect(issue).toEqual(createTestIssue());
  });

  it('reports a missing issue', async () => {
    const error = (
      await getIssue({ issuesRepo: makeFakeIssuesRepo(createNewsletterStore()) }, 'issue-9')
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'IssueNotFoundError',
      message: 'Newsletter issue not found: issue-9',
      issueId: 'issue-9',
    });
  });

  it('passes database errors through', async () => {
    const repo = makeFakeIssuesRepo(createNewsletterStore(), { simulateDbError: true });

    expect((await getIssue({ issuesRepo: repo }, 'issue-1'))._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});
