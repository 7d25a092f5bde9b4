/**
 * Newsletter Issues Module - Public API
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export type { PublishScope, IssuesRepository } from './core/ports.js';
export { validateIssueContent } from './core/validation.js';
export {
  publishIssue,
  type PublishIssueDeps,
  type PublishIssueInput,
  type PublishIssueOutput,
} from './core/usecases/publish-issue.js';
export { listIssues, type ListIssuesDeps } from './core/usecases/list-issues.js';
export { getIssue, type GetIssueDeps } from './core/usecases/get-issue.js';

// Shell
export {
  makePublishScope,
  makeIssuesRepo,
  type IssuesRepoConfig,
} from './shell/repo/issues-repo.js';
export { renderAcceptedResponse, JSON_CONTENT_TYPE } from './shell/rest/responses.js';
export { makeIssueRoutes, type MakeIssueRoutesDeps } from './shell/rest/routes.js';
