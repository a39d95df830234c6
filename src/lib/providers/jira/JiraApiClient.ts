// JiraApiClient - REST API wrapper for Jira operations
// Handles authentication, markdown-to-ADF conversion of rich text fields and response validation

import https from 'node:https'
import { z } from 'zod'
import { getLogger } from '../../../utils/logger-context.js'
import { markdownToAdf } from '../../adf/index.js'
import type { AdfDocument, ConverterOptions } from '../../adf/index.js'
import { JiraServiceError } from '../../../types/jira.js'

/**
 * Jira API configuration
 */
export interface JiraConfig {
	host: string // e.g., "https://yourcompany.atlassian.net"
	username: string // account email
	apiToken: string // API token from Atlassian account
	converter?: ConverterOptions
}

const NamedSchema = z.object({ name: z.string() })

export const JiraIssueSchema = z.object({
	id: z.string(),
	key: z.string(),
	fields: z
		.object({
			summary: z.string().nullish(),
			description: z.unknown(), // ADF document, string or null
			status: NamedSchema.nullish(),
			issuetype: NamedSchema.nullish(),
			priority: NamedSchema.nullish(),
			project: z.object({ key: z.string(), name: z.string().optional() }).nullish(),
			assignee: z.object({ displayName: z.string().optional(), accountId: z.string().optional() }).nullish(),
			created: z.string().nullish(),
			updated: z.string().nullish(),
		})
		.default({}),
})

/**
 * Jira issue as returned by search
 */
export type JiraIssue = z.infer<typeof JiraIssueSchema>

const CreatedIssueSchema = z.object({ id: z.string(), key: z.string() })

/**
 * Jira response to an issue creation
 */
export type JiraCreatedIssue = z.infer<typeof CreatedIssueSchema>

const SearchResponseSchema = z.object({
	issues: z.array(JiraIssueSchema).default([]),
	nextPageToken: z.string().nullish(),
})

const CommentSchema = z.object({ id: z.string() }).passthrough()

/**
 * Jira comment response from API
 */
export type JiraComment = z.infer<typeof CommentSchema>

const UserSchema = z.object({
	accountId: z.string(),
	emailAddress: z.string().optional(),
	displayName: z.string().optional(),
})

const ErrorBodySchema = z.object({
	errorMessages: z.array(z.string()).optional(),
	errors: z.record(z.string(), z.unknown()).optional(),
})

export const SEARCH_FIELDS = [
	'summary', 'description', 'status', 'issuetype', 'priority', 'project',
	'assignee', 'created', 'updated',
]

const REQUEST_TIMEOUT_MS = 30000
const SEARCH_PAGE_SIZE = 100

export interface CreateIssueInput {
	projectKey: string
	summary: string
	description: string // markdown
	issueType: string
	assigneeAccountId?: string
	additionalFields?: Record<string, unknown>
}

export interface UpdateIssueInput {
	summary?: string
	description?: string // markdown
	issueType?: string
	assigneeAccountId?: string
	additionalFields?: Record<string, unknown>
}

/**
 * Build a readable message from a Jira error body, falling back to the raw text
 */
export function formatJiraError(data: string): string {
	let parsed: unknown
	try {
		parsed = JSON.parse(data)
	} catch {
		return data
	}

	const body = ErrorBodySchema.safeParse(parsed)
	if (!body.success) return data

	const parts: string[] = []
	if (body.data.errorMessages?.length) {
		parts.push(`messages: ${body.data.errorMessages.join(', ')}`)
	}
	if (body.data.errors && Object.keys(body.data.errors).length) {
		parts.push(`field errors: ${JSON.stringify(body.data.errors)}`)
	}
	return parts.length ? parts.join('; ') : data
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, endpoint: string): T {
	const result = schema.safeParse(data)
	if (!result.success) {
		throw new JiraServiceError(`Unexpected Jira API response from ${endpoint}: ${result.error.issues[0]?.message ?? 'invalid shape'}`)
	}
	return result.data
}

/**
 * JiraApiClient provides low-level REST API access to Jira
 *
 * Authentication: Basic Auth with account email and API token
 * API Reference: https://developer.atlassian.com/cloud/jira/platform/rest/v3/
 */
export class JiraApiClient {
	private readonly baseUrl: string
	private readonly authHeader: string
	private readonly converterOptions: ConverterOptions

	constructor(config: JiraConfig) {
		this.baseUrl = `${config.host.replace(/\/$/, '')}/rest/api/3`
		this.converterOptions = config.converter ?? {}

		const credentials = Buffer.from(`${config.username}:${config.apiToken}`).toString('base64')
		this.authHeader = `Basic ${credentials}`
	}

	/**
	 * Make an HTTP request to Jira API. Resolves with the parsed JSON body, or undefined for empty responses.
	 */
	private async request(method: 'GET' | 'POST' | 'PUT', endpoint: string, body?: unknown): Promise<unknown> {
		const url = new URL(`${this.baseUrl}${endpoint}`)
		getLogger().debug(`Jira API ${method} request`, { url: url.toString() })
		if (body !== undefined) {
			getLogger().debug('Jira API request body', JSON.stringify(body, null, 2))
		}

		return new Promise((resolve, reject) => {
			const options: https.RequestOptions = {
				hostname: url.hostname,
				port: url.port || 443,
				path: url.pathname + url.search,
				method,
				timeout: REQUEST_TIMEOUT_MS,
				headers: {
					'Authorization': this.authHeader,
					'Accept': 'application/json',
					'Content-Type': 'application/json',
				},
			}

			const req = https.request(options, (res) => {
				const chunks: Buffer[] = []

				res.on('data', (chunk: Buffer) => {
					chunks.push(chunk)
				})

				res.on('end', () => {
					const data = Buffer.concat(chunks).toString('utf8')
					const status = res.statusCode ?? 0

					if (status < 200 || status >= 300) {
						reject(new JiraServiceError(`Jira API error (${status}): ${formatJiraError(data)}`, status))
						return
					}

					// 204 No Content and similar
					if (!data) {
						resolve(undefined)
						return
					}

					try {
						resolve(JSON.parse(data))
					} catch (error) {
						reject(new JiraServiceError(`Failed to parse Jira API response: ${error instanceof Error ? error.message : String(error)}`, status))
					}
				})
			})

			req.on('timeout', () => {
				req.destroy()
				reject(new JiraServiceError(`Jira API request timed out after ${REQUEST_TIMEOUT_MS / 1000} seconds`))
			})

			req.on('error', (error) => {
				reject(new JiraServiceError(`Jira API request failed: ${error.message}`))
			})

			if (body !== undefined) {
				req.write(JSON.stringify(body))
			}

			req.end()
		})
	}

	private convert(markdown: string): AdfDocument {
		return markdownToAdf(markdown, this.converterOptions)
	}

	/**
	 * Create a new issue. The markdown description is converted to ADF.
	 */
	async createIssue(input: CreateIssueInput): Promise<JiraCreatedIssue> {
		const fields: Record<string, unknown> = {
			project: { key: input.projectKey },
			summary: input.summary,
			description: this.convert(input.description),
			issuetype: { name: input.issueType },
		}
		if (input.assigneeAccountId) {
			fields.assignee = { accountId: input.assigneeAccountId }
		}

		const data = await this.request('POST', '/issue', { fields: { ...fields, ...input.additionalFields } })
		return parseResponse(CreatedIssueSchema, data, '/issue')
	}

	/**
	 * Update an issue. Only the supplied fields are sent; a markdown description is converted to ADF.
	 */
	async updateIssue(issueKey: string, input: UpdateIssueInput): Promise<void> {
		const fields: Record<string, unknown> = {}
		if (input.summary !== undefined) {
			fields.summary = input.summary
		}
		if (input.description !== undefined) {
			fields.description = this.convert(input.description)
		}
		if (input.issueType !== undefined) {
			fields.issuetype = { name: input.issueType }
		}
		if (input.assigneeAccountId !== undefined) {
			fields.assignee = { accountId: input.assigneeAccountId }
		}

		await this.request('PUT', `/issue/${encodeURIComponent(issueKey)}`, { fields: { ...fields, ...input.additionalFields } })
	}

	/**
	 * Search issues using JQL, following `nextPageToken` until `maxResults` issues are collected
	 */
	async searchIssues(jql: string, maxResults: number): Promise<JiraIssue[]> {
		const issues: JiraIssue[] = []
		let nextPageToken: string | undefined

		while (issues.length < maxResults) {
			const body: Record<string, unknown> = {
				jql,
				maxResults: Math.min(SEARCH_PAGE_SIZE, maxResults - issues.length),
				fields: SEARCH_FIELDS,
			}
			if (nextPageToken) {
				body.nextPageToken = nextPageToken
			}

			const response = parseResponse(SearchResponseSchema, await this.request('POST', '/search/jql', body), '/search/jql')
			issues.push(...response.issues)

			if (!response.nextPageToken || response.issues.length === 0) {
				break
			}
			nextPageToken = response.nextPageToken
		}

		return issues.slice(0, maxResults)
	}

	/**
	 * Add a comment to an issue. The markdown body is converted to ADF.
	 */
	async addComment(issueKey: string, body: string): Promise<JiraComment> {
		getLogger().debug('Adding comment to Jira issue', { issueKey, bodyLength: body.length })
		const endpoint = `/issue/${encodeURIComponent(issueKey)}/comment`
		return parseResponse(CommentSchema, await this.request('POST', endpoint, { body: this.convert(body) }), endpoint)
	}

	/**
	 * Resolve a user's account id from their email address. Returns null when no user matches exactly.
	 */
	async findUserByEmail(email: string): Promise<string | null> {
		const endpoint = `/user/search?query=${encodeURIComponent(email)}`
		const users = parseResponse(z.array(UserSchema), await this.request('GET', endpoint), '/user/search')
		const wanted = email.toLowerCase()
		const match = users.find((user) => user.emailAddress?.toLowerCase() === wanted) ?? (users.length === 1 ? users[0] : undefined)
		return match?.accountId ?? null
	}

	/**
	 * Test connection to Jira API. Returns false on authentication failures and rethrows anything else.
	 */
	async testConnection(): Promise<boolean> {
		try {
			await this.request('GET', '/myself')
			return true
		} catch (error) {
			if (error instanceof JiraServiceError && (error.status === 401 || error.status === 403)) {
				getLogger().error('Jira connection test failed: authentication error', { status: error.status })
				return false
			}
			throw error
		}
	}
}
