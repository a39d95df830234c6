/**
 * Jira MCP Server
 *
 * A Model Context Protocol server that lets an assistant create, update, search and comment on
 * Jira issues. Descriptions and comment bodies arrive as markdown and are sent to Jira as ADF.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { z } from 'zod'
import { markdownToAdf } from '../lib/adf/index.js'
import { JiraIssueService } from '../lib/providers/jira/index.js'
import { getActiveSite, type JiraMcpSettings } from '../lib/SettingsManager.js'
import type { JiraSite } from '../types/jira.js'
import { formatSearchResults } from '../utils/jira.js'
import { createStderrLogger, type Logger } from '../utils/logger.js'
import { getLogger, withLogger } from '../utils/logger-context.js'
import { JiraSseServer, type JiraSseServerOptions } from './JiraSseServer.js'

export const SERVER_VERSION = '0.1.0'

/**
 * Operations the tools need from an issue service
 */
export type IssueService = Pick<JiraIssueService, 'createIssue' | 'updateIssue' | 'searchIssues' | 'addComment'>

export type IssueServiceFactory = (site: JiraSite) => IssueService

export interface ToolResult {
	[key: string]: unknown
	content: Array<{ type: 'text'; text: string }>
}

export interface CreateIssueToolInput {
	project: string
	summary: string
	description: string
	issue_type?: string | undefined
	site_alias?: string | undefined
	assignee?: string | undefined
	additional_fields?: Record<string, unknown> | undefined
}

export interface UpdateIssueToolInput {
	issue_key: string
	summary?: string | undefined
	description?: string | undefined
	issue_type?: string | undefined
	site_alias?: string | undefined
	assignee?: string | undefined
	additional_fields?: Record<string, unknown> | undefined
}

export interface SearchIssuesToolInput {
	query: string
	site_alias?: string | undefined
	max_results?: number | undefined
}

export interface AddCommentToolInput {
	issue_key: string
	body: string
	site_alias?: string | undefined
}

const CODE_BLOCK_HINT =
	'When the content includes code, use fenced code blocks with a language, e.g. ```python ... ```, ' +
	'so Jira renders them as code blocks.'

function textResult(text: string): ToolResult {
	return { content: [{ type: 'text', text }] }
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Tool implementations, independent of the transport. Failures come back as text results
 * so the calling assistant can read them; they are logged as errors too.
 */
export class JiraTools {
	private readonly services = new Map<string, IssueService>()

	constructor(
		private readonly settings: JiraMcpSettings,
		private readonly createService: IssueServiceFactory = (site) =>
			new JiraIssueService(site, { converter: settings.converter, defaultIssueType: settings.defaults.issueType }),
	) {}

	private serviceFor(alias: string | undefined): IssueService {
		const site = getActiveSite(this.settings, alias)
		const cached = this.services.get(site.alias)
		if (cached) return cached

		const service = this.createService(site)
		this.services.set(site.alias, service)
		return service
	}

	async createIssue(input: CreateIssueToolInput): Promise<ToolResult> {
		getLogger().debug(
			`create_jira_issue: project=${input.project}, issue_type=${input.issue_type ?? 'default'}, site_alias=${input.site_alias ?? 'default'}`,
		)
		try {
			const result = await this.serviceFor(input.site_alias).createIssue({
				project: input.project,
				summary: input.summary,
				description: input.description,
				issueType: input.issue_type ?? this.settings.defaults.issueType,
				...(input.assignee !== undefined && { assignee: input.assignee }),
				...(input.additional_fields !== undefined && { additionalFields: input.additional_fields }),
			})
			getLogger().info(`Created Jira issue ${result.key}`)
			return textResult(`Successfully created JIRA issue: ${result.key} (ID: ${result.id}). URL: ${result.url}`)
		} catch (error) {
			getLogger().error(`create_jira_issue failed: ${errorMessage(error)}`)
			return textResult(`Error creating JIRA issue: ${errorMessage(error)}`)
		}
	}

	async updateIssue(input: UpdateIssueToolInput): Promise<ToolResult> {
		getLogger().debug(`update_jira_issue: issue_key=${input.issue_key}, site_alias=${input.site_alias ?? 'default'}`)
		try {
			const result = await this.serviceFor(input.site_alias).updateIssue({
				issueKey: input.issue_key,
				...(input.summary !== undefined && { summary: input.summary }),
				...(input.description !== undefined && { description: input.description }),
				...(input.issue_type !== undefined && { issueType: input.issue_type }),
				...(input.assignee !== undefined && { assignee: input.assignee }),
				...(input.additional_fields !== undefined && { additionalFields: input.additional_fields }),
			})
			getLogger().info(`Updated Jira issue ${result.key}`)
			return textResult(
				`Successfully updated JIRA issue: ${result.key}. Updated fields: ${result.updatedFields.join(', ')}. URL: ${result.url}`,
			)
		} catch (error) {
			getLogger().error(`update_jira_issue failed: ${errorMessage(error)}`)
			return textResult(`Error updating JIRA issue: ${errorMessage(error)}`)
		}
	}

	async searchIssues(input: SearchIssuesToolInput): Promise<ToolResult> {
		getLogger().debug(`search_jira_issues: query='${input.query}', site_alias=${input.site_alias ?? 'default'}`)
		try {
			const maxResults = input.max_results ?? this.settings.defaults.searchMaxResults
			const issues = await this.serviceFor(input.site_alias).searchIssues(input.query, maxResults)
			getLogger().info(`Jira search found ${issues.length} issues`)
			return textResult(formatSearchResults(input.query, issues))
		} catch (error) {
			getLogger().error(`search_jira_issues failed: ${errorMessage(error)}`)
			return textResult(`Error searching JIRA issues: ${errorMessage(error)}`)
		}
	}

	async addComment(input: AddCommentToolInput): Promise<ToolResult> {
		getLogger().debug(`add_jira_comment: issue_key=${input.issue_key}, site_alias=${input.site_alias ?? 'default'}`)
		try {
			const result = await this.serviceFor(input.site_alias).addComment(input.issue_key, input.body)
			return textResult(`Successfully added comment ${result.id} to ${input.issue_key}. URL: ${result.url}`)
		} catch (error) {
			getLogger().error(`add_jira_comment failed: ${errorMessage(error)}`)
			return textResult(`Error adding comment to JIRA issue: ${errorMessage(error)}`)
		}
	}

	convertMarkdown(markdown: string): ToolResult {
		return textResult(JSON.stringify(markdownToAdf(markdown, this.settings.converter), null, 2))
	}
}

/**
 * Build the MCP server with every Jira tool registered. Each call runs with `logger` in context.
 */
export function createJiraServer(tools: JiraTools, name: string, logger: Logger = createStderrLogger()): McpServer {
	const server = new McpServer({ name, version: SERVER_VERSION })
	const inContext = async (fn: () => Promise<ToolResult>): Promise<ToolResult> => withLogger(logger, fn)

	server.registerTool(
		'create_jira_issue',
		{
			title: 'Create Jira Issue',
			description: `Create a Jira issue. The description is markdown and is converted to Atlassian Document Format. ${CODE_BLOCK_HINT}`,
			inputSchema: {
				project: z.string().min(1).describe('Project key, e.g. "PROJ"'),
				summary: z.string().min(1).describe('Issue summary'),
				description: z.string().describe('Issue description in markdown'),
				issue_type: z.string().optional().describe('Issue type name (default: Task)'),
				site_alias: z.string().optional().describe('Configured site alias; defaults to the default site'),
				assignee: z.string().optional().describe('Assignee email address or account id'),
				additional_fields: z.record(z.string(), z.unknown()).optional().describe('Extra Jira fields sent as-is'),
			},
		},
		async (input) => inContext(() => tools.createIssue(input)),
	)

	server.registerTool(
		'update_jira_issue',
		{
			title: 'Update Jira Issue',
			description: `Update an existing Jira issue. Only provided fields are changed. ${CODE_BLOCK_HINT}`,
			inputSchema: {
				issue_key: z.string().min(1).describe('Issue key, e.g. "PROJ-123"'),
				summary: z.string().optional().describe('New summary'),
				description: z.string().optional().describe('New description in markdown'),
				issue_type: z.string().optional().describe('New issue type name'),
				site_alias: z.string().optional().describe('Configured site alias; defaults to the default site'),
				assignee: z.string().optional().describe('Assignee email address or account id'),
				additional_fields: z.record(z.string(), z.unknown()).optional().describe('Extra Jira fields sent as-is'),
			},
		},
		async (input) => inContext(() => tools.updateIssue(input)),
	)

	server.registerTool(
		'search_jira_issues',
		{
			title: 'Search Jira Issues',
			description: 'Search for Jira issues using JQL (Jira Query Language) syntax',
			inputSchema: {
				query: z.string().min(1).describe('JQL query, e.g. project = ABC AND status = "In Progress"'),
				site_alias: z.string().optional().describe('Configured site alias; defaults to the default site'),
				max_results: z.number().int().min(1).max(1000).optional().describe('Maximum issues to return (default: 50)'),
			},
		},
		async (input) => inContext(() => tools.searchIssues(input)),
	)

	server.registerTool(
		'add_jira_comment',
		{
			title: 'Add Jira Comment',
			description: `Add a markdown comment to a Jira issue. ${CODE_BLOCK_HINT}`,
			inputSchema: {
				issue_key: z.string().min(1).describe('Issue key, e.g. "PROJ-123"'),
				body: z.string().min(1).describe('Comment body in markdown'),
				site_alias: z.string().optional().describe('Configured site alias; defaults to the default site'),
			},
		},
		async (input) => inContext(() => tools.addComment(input)),
	)

	server.registerTool(
		'convert_markdown_to_adf',
		{
			title: 'Convert Markdown to ADF',
			description: 'Show the Atlassian Document Format JSON that a markdown text converts to',
			inputSchema: {
				markdown: z.string().describe('Markdown text'),
			},
		},
		async ({ markdown }) => inContext(async () => tools.convertMarkdown(markdown)),
	)

	return server
}

/**
 * Start the server on stdio. All logging goes to stderr since stdout carries the protocol.
 */
export async function startJiraServer(settings: JiraMcpSettings, logger: Logger = createStderrLogger()): Promise<McpServer> {
	const server = createJiraServer(new JiraTools(settings), settings.name, logger)

	logger.info(`Starting ${settings.name} ${SERVER_VERSION} (PID ${process.pid}, Node ${process.version})`)
	const sites = Object.keys(settings.sites)
	logger.info(`Configured Jira sites: ${sites.length > 0 ? sites.join(', ') : 'none'}`)

	await server.connect(new StdioServerTransport())
	logger.info('Jira MCP server ready (stdio transport)')
	return server
}

/**
 * Start the server over HTTP with server-sent events. Sessions share one set of tools and site clients.
 */
export async function startJiraSseServer(
	settings: JiraMcpSettings,
	options: JiraSseServerOptions,
	logger: Logger = createStderrLogger(),
): Promise<JiraSseServer> {
	const tools = new JiraTools(settings)
	const sseServer = new JiraSseServer(() => createJiraServer(tools, settings.name, logger), logger)

	logger.info(`Starting ${settings.name} ${SERVER_VERSION} (PID ${process.pid}, Node ${process.version})`)
	await sseServer.start(options)
	logger.info('Jira MCP server ready (sse transport)')
	return sseServer
}
