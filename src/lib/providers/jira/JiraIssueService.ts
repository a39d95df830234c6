// JiraIssueService - Issue operations behind the MCP tools, one instance per configured site
// Resolves assignees, builds browse URLs and normalizes search results

import { getLogger } from '../../../utils/logger-context.js'
import { getPlainText } from '../../adf/index.js'
import type { ConverterOptions } from '../../adf/index.js'
import { JiraServiceError, type JiraSite } from '../../../types/jira.js'
import { JiraApiClient, type JiraIssue, type UpdateIssueInput } from './JiraApiClient.js'

export interface CreateIssueParams {
	project: string
	summary: string
	description: string // markdown
	issueType?: string
	assignee?: string // email address or account id
	additionalFields?: Record<string, unknown>
}

export interface UpdateIssueParams {
	issueKey: string
	summary?: string
	description?: string // markdown
	issueType?: string
	assignee?: string
	additionalFields?: Record<string, unknown>
}

export interface CreatedIssue {
	id: string
	key: string
	url: string
}

export interface UpdatedIssue {
	key: string
	url: string
	updatedFields: string[]
}

export interface AddedComment {
	id: string
	url: string
}

/**
 * Flattened issue data used for search output
 */
export interface IssueSummary {
	key: string
	summary: string
	project: string | null
	issueType: string | null
	status: string | null
	priority: string | null
	assignee: string | null
	created: string | null
	updated: string | null
	url: string
	description: string | null
}

export interface JiraIssueServiceOptions {
	converter?: ConverterOptions
	defaultIssueType?: string
}

export class JiraIssueService {
	private readonly client: JiraApiClient
	private readonly siteUrl: string
	private readonly defaultIssueType: string

	constructor(site: JiraSite, options: JiraIssueServiceOptions = {}) {
		this.siteUrl = site.url.replace(/\/$/, '')
		this.defaultIssueType = options.defaultIssueType ?? 'Task'
		this.client = new JiraApiClient({
			host: site.url,
			username: site.email,
			apiToken: site.apiToken,
			...(options.converter && { converter: options.converter }),
		})
	}

	browseUrl(key: string): string {
		return `${this.siteUrl}/browse/${key}`
	}

	/**
	 * Turn an assignee given as email into an account id. Values without "@" are taken as account ids.
	 */
	private async resolveAssignee(assignee: string): Promise<string> {
		if (!assignee.includes('@')) return assignee

		const accountId = await this.client.findUserByEmail(assignee)
		if (!accountId) {
			throw new JiraServiceError(`No Jira user found for assignee ${assignee}`)
		}
		getLogger().debug(`Resolved assignee ${assignee} to account ${accountId}`)
		return accountId
	}

	async createIssue(params: CreateIssueParams): Promise<CreatedIssue> {
		const assigneeAccountId = params.assignee ? await this.resolveAssignee(params.assignee) : undefined

		const created = await this.client.createIssue({
			projectKey: params.project,
			summary: params.summary,
			description: params.description,
			issueType: params.issueType ?? this.defaultIssueType,
			...(assigneeAccountId ? { assigneeAccountId } : {}),
			...(params.additionalFields && { additionalFields: params.additionalFields }),
		})

		getLogger().debug(`Created Jira issue ${created.key}`)
		return { id: created.id, key: created.key, url: this.browseUrl(created.key) }
	}

	/**
	 * Update only the supplied fields. Fails when nothing would change.
	 */
	async updateIssue(params: UpdateIssueParams): Promise<UpdatedIssue> {
		const input: UpdateIssueInput = {}
		const updatedFields: string[] = []

		if (params.summary !== undefined) {
			input.summary = params.summary
			updatedFields.push('summary')
		}
		if (params.description !== undefined) {
			input.description = params.description
			updatedFields.push('description')
		}
		if (params.issueType !== undefined) {
			input.issueType = params.issueType
			updatedFields.push('issue_type')
		}
		if (params.assignee !== undefined) {
			input.assigneeAccountId = await this.resolveAssignee(params.assignee)
			updatedFields.push('assignee')
		}
		if (params.additionalFields && Object.keys(params.additionalFields).length > 0) {
			input.additionalFields = params.additionalFields
			updatedFields.push(...Object.keys(params.additionalFields))
		}

		if (updatedFields.length === 0) {
			throw new JiraServiceError('No fields provided to update')
		}

		await this.client.updateIssue(params.issueKey, input)
		return { key: params.issueKey, url: this.browseUrl(params.issueKey), updatedFields }
	}

	async searchIssues(jql: string, maxResults: number): Promise<IssueSummary[]> {
		const issues = await this.client.searchIssues(jql, maxResults)
		getLogger().debug(`Jira search returned ${issues.length} issues`)
		return issues.map((issue) => this.summarize(issue))
	}

	async addComment(issueKey: string, body: string): Promise<AddedComment> {
		const comment = await this.client.addComment(issueKey, body)
		return {
			id: comment.id,
			url: `${this.browseUrl(issueKey)}?focusedCommentId=${comment.id}`,
		}
	}

	async testConnection(): Promise<boolean> {
		return this.client.testConnection()
	}

	private summarize(issue: JiraIssue): IssueSummary {
		const { fields } = issue
		const description = fields.description ? getPlainText(fields.description).trim() : ''

		return {
			key: issue.key,
			summary: fields.summary ?? '',
			project: fields.project?.name ?? fields.project?.key ?? null,
			issueType: fields.issuetype?.name ?? null,
			status: fields.status?.name ?? null,
			priority: fields.priority?.name ?? null,
			assignee: fields.assignee?.displayName ?? null,
			created: fields.created ?? null,
			updated: fields.updated ?? null,
			url: this.browseUrl(issue.key),
			description: description || null,
		}
	}
}
