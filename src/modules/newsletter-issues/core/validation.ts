import { ok, err, type Result } from 'neverthrow';

import { createIssueValidationError, type IssueValidationError } from './errors.js';

import type { IssueContentInput } from './types.js';

/**
 * Checks that every part of an issue is present. Fields are checked in the
 * order title, text, html and the first blank one is reported.
 */
export function validateIssueContent(
  input: IssueContentInput
): Result<IssueContentInput, IssueValidationError> {
  if (input.title.trim() === '') {
    return err(createIssueValidationError('title', 'You must set a title for your newsletter.'));
  }
  if (input.textContent.trim() === '') {
    return err(
      createIssueValidationError('textContent', 'You must set text content for your newsletter.')
    );
  }
  if (input.htmlContent.trim() === '') {
    return err(
      createIssueValidationError('htmlContent', 'You must set html content for your newsletter.')
    );
  }
  return ok(input);
}
