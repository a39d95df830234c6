// Jira provider exports
export {
	JiraApiClient,
	formatJiraError,
	type JiraConfig,
	type JiraIssue,
	type JiraComment,
	type JiraCreatedIssue,
	type CreateIssueInput,
	type UpdateIssueInput,
} from './JiraApiClient.js'
export {
	JiraIssueService,
	type AddedComment,
	type CreateIssueParams,
	type CreatedIssue,
	type IssueSummary,
	type JiraIssueServiceOptions,
	type UpdateIssueParams,
	type UpdatedIssue,
} from './JiraIssueService.js'
