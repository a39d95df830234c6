import { describe, it, expect, vi, beforeEach } from 'vitest'
import { JiraTools, type IssueService } from './jira-server.js'
import type { JiraMcpSettings } from '../lib/SettingsManager.js'
import { JiraServiceError, type JiraSite } from '../types/jira.js'

vi.mock('../utils/logger-context.js', () => ({
	getLogger: () => ({
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
	withLogger: <T>(_logger: unknown, fn: () => T) => fn(),
}))

const site = { url: 'https://work.example.test', email: 'me@example.test', apiToken: 'test-api-token' }

function createSettings(overrides: Partial<JiraMcpSettings> = {}): JiraMcpSettings {
	return {
		name: 'jira-markdown-mcp',
		sites: { work: site },
		converter: { maxNestingDepth: 10, maxTableColumns: 64 },
		defaults: { issueType: 'Task', searchMaxResults: 50 },
		...overrides,
	}
}

describe('JiraTools', () => {
	let service: {
		createIssue: ReturnType<typeof vi.fn>
		updateIssue: ReturnType<typeof vi.fn>
		searchIssues: ReturnType<typeof vi.fn>
		addComment: ReturnType<typeof vi.fn>
	}
	let factory: ReturnType<typeof vi.fn>
	let tools: JiraTools

	beforeEach(() => {
		service = {
			createIssue: vi.fn(),
			updateIssue: vi.fn(),
			searchIssues: vi.fn(),
			addComment: vi.fn(),
		}
		factory = vi.fn((_site: JiraSite) => service as unknown as IssueService)
		tools = new JiraTools(createSettings(), (s) => factory(s) as IssueService)
	})

	describe('createIssue', () => {
		it('should report the created issue', async () => {
			service.createIssue.mockResolvedValue({ id: '10001', key: 'PROJ-1', url: 'https://work.example.test/browse/PROJ-1' })

			const result = await tools.createIssue({ project: 'PROJ', summary: 'S', description: '# D' })

			expect(result.content).toEqual([
				{ type: 'text', text: 'Successfully created JIRA issue: PROJ-1 (ID: 10001). URL: https://work.example.test/browse/PROJ-1' },
			])
			expect(service.createIssue).toHaveBeenCalledWith({ project: 'PROJ', summary: 'S', description: '# D', issueType: 'Task' })
			expect(factory).toHaveBeenCalledWith({ alias: 'work', ...site })
		})

		it('should pass assignee and additional fields through', async () => {
			service.createIssue.mockResolvedValue({ id: '1', key: 'P-1', url: 'u' })

			await tools.createIssue({
				project: 'P',
				summary: 'S',
				description: 'D',
				issue_type: 'Bug',
				assignee: 'dev@example.test',
				additional_fields: { labels: ['x'] },
			})

			expect(service.createIssue).toHaveBeenCalledWith({
				project: 'P',
				summary: 'S',
				description: 'D',
				issueType: 'Bug',
				assignee: 'dev@example.test',
				additionalFields: { labels: ['x'] },
			})
		})

		it('should return service errors as text', async () => {
			service.createIssue.mockRejectedValue(new JiraServiceError('Jira API error (400): messages: bad project', 400))

			const result = await tools.createIssue({ project: 'X', summary: 'S', description: 'D' })

			expect(result.content[0]?.text).toBe('Error creating JIRA issue: Jira API error (400): messages: bad project')
		})

		it('should return configuration errors as text', async () => {
			const result = await tools.createIssue({ project: 'X', summary: 'S', description: 'D', site_alias: 'nope' })

			expect(result.content[0]?.text).toBe("Error creating JIRA issue: Unknown Jira site alias 'nope'. Available sites: work")
			expect(factory).not.toHaveBeenCalled()
		})
	})

	describe('updateIssue', () => {
		it('should list the updated fields', async () => {
			service.updateIssue.mockResolvedValue({
				key: 'PROJ-2',
				url: 'https://work.example.test/browse/PROJ-2',
				updatedFields: ['summary', 'description'],
			})

			const result = await tools.updateIssue({ issue_key: 'PROJ-2', summary: 'New', description: 'Body' })

			expect(result.content[0]?.text).toBe(
				'Successfully updated JIRA issue: PROJ-2. Updated fields: summary, description. URL: https://work.example.test/browse/PROJ-2',
			)
			expect(service.updateIssue).toHaveBeenCalledWith({ issueKey: 'PROJ-2', summary: 'New', description: 'Body' })
		})

		it('should report a missing update as an error', async () => {
			service.updateIssue.mockRejectedValue(new JiraServiceError('No fields provided to update'))

			const result = await tools.updateIssue({ issue_key: 'PROJ-2' })

			expect(result.content[0]?.text).toBe('Error updating JIRA issue: No fields provided to update')
		})
	})

	describe('searchIssues', () => {
		it('should use the configured default page size', async () => {
			service.searchIssues.mockResolvedValue([])

			const result = await tools.searchIssues({ query: 'project = PROJ' })

			expect(service.searchIssues).toHaveBeenCalledWith('project = PROJ', 50)
			expect(result.content[0]?.text).toBe('No issues found for query: project = PROJ')
		})

		it('should format found issues', async () => {
			service.searchIssues.mockResolvedValue([
				{
					key: 'PROJ-3',
					summary: 'Crash',
					project: 'Project',
					issueType: 'Bug',
					status: 'Done',
					priority: null,
					assignee: null,
					created: null,
					updated: null,
					url: 'https://work.example.test/browse/PROJ-3',
					description: null,
				},
			])

			const result = await tools.searchIssues({ query: 'key = PROJ-3', max_results: 5 })

			expect(service.searchIssues).toHaveBeenCalledWith('key = PROJ-3', 5)
			expect(result.content[0]?.text.split('\n').slice(0, 3)).toEqual(['Found 1 issues:', '', '**PROJ-3**: Crash'])
		})
	})

	describe('addComment', () => {
		it('should report the comment id and url', async () => {
			service.addComment.mockResolvedValue({ id: '200', url: 'https://work.example.test/browse/PROJ-1?focusedCommentId=200' })

			const result = await tools.addComment({ issue_key: 'PROJ-1', body: 'Looks **good**' })

			expect(service.addComment).toHaveBeenCalledWith('PROJ-1', 'Looks **good**')
			expect(result.content[0]?.text).toBe(
				'Successfully added comment 200 to PROJ-1. URL: https://work.example.test/browse/PROJ-1?focusedCommentId=200',
			)
		})
	})

	it('should reuse one service per site', async () => {
		service.addComment.mockResolvedValue({ id: '1', url: 'u' })

		await tools.addComment({ issue_key: 'A-1', body: 'x' })
		await tools.addComment({ issue_key: 'A-1', body: 'y', site_alias: 'work' })

		expect(factory).toHaveBeenCalledTimes(1)
	})

	it('should convert markdown to ADF JSON', () => {
		const result = tools.convertMarkdown('hi')

		expect(JSON.parse(result.content[0]?.text ?? '')).toEqual({
			version: 1,
			type: 'doc',
			content: [{ type: 'paragraph', content: [{ type: 'text', text: 'hi' }] }],
		})
	})
})
