export { JiraIssueSource } from './jira.js'
export type { JiraOptions } from './jira.js'
export { AzureDevOpsChangeSource, diffContents, normalizeChangeType } from './azure-devops.js'
export type { AzureDevOpsOptions } from './azure-devops.js'
export { extractAdfText, descriptionToText } from './adf.js'
export {
  SourceError,
  IssueNotFoundError,
  IssueAuthError,
  ChangeNotFoundError,
  ChangeAuthError
} from './errors.js'
export type {
  IssueRecord,
  CommitRecord,
  FileChange,
  ChangeType,
  ChangeData,
  IssueSource,
  ChangeSource
} from './types.js'
