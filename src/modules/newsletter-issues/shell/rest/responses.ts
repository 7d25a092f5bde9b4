/**
 * The publish response as stored for replay. Headers and body are fixed here
 * so a replay is byte-identical to the first answer.
 */

import { ISSUE_ACCEPTED_MESSAGE, type EnqueuedIssue } from '../../core/types.js';

import type { SavedResponse } from '../../../idempotency/index.js';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export const renderAcceptedResponse = (issue: EnqueuedIssue): SavedResponse => ({
  statusCode: 202,
  headers: [{ name: 'content-type', value: JSON_CONTENT_TYPE }],
  body: JSON.stringify({
    ok: true,
    data: {
      issueId: issue.issueId,
      subscribersAtPublish: issue.subscribersAtPublish,
      message: ISSUE_ACCEPTED_MESSAGE,
    },
  }),
});
