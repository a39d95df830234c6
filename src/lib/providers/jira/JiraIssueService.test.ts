import { describe, it, expect, vi, beforeEach } from 'vitest'
import { JiraIssueService } from './JiraIssueService.js'
import { JiraApiClient, type JiraIssue } from './JiraApiClient.js'
import { JiraServiceError, type JiraSite } from '../../../types/jira.js'

// Mock JiraApiClient
vi.mock('./JiraApiClient.js', () => ({
	JiraApiClient: vi.fn(),
}))

// Mock logger
vi.mock('../../../utils/logger-context.js', () => ({
	getLogger: () => ({
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}))

function createSite(overrides: Partial<JiraSite> = {}): JiraSite {
	return {
		alias: 'work',
		url: 'https://mycompany.atlassian.net/',
		email: 'user@example.com',
		apiToken: 'test-api-token',
		...overrides,
	}
}

function createJiraIssue(overrides: Partial<JiraIssue['fields']> = {}): JiraIssue {
	return {
		id: '10001',
		key: 'PROJ-101',
		fields: {
			summary: 'Child task',
			description: {
				version: 1,
				type: 'doc',
				content: [
					{ type: 'paragraph', content: [{ type: 'text', text: 'First ' }, { type: 'text', text: 'line', marks: [{ type: 'strong' }] }] },
					{ type: 'paragraph', content: [{ type: 'text', text: 'Second' }] },
				],
			},
			status: { name: 'In Progress' },
			issuetype: { name: 'Task' },
			priority: { name: 'Medium' },
			project: { key: 'PROJ', name: 'My Project' },
			assignee: { displayName: 'Sam Lee', accountId: 'acc-1' },
			created: '2024-01-01T00:00:00.000Z',
			updated: '2024-01-02T00:00:00.000Z',
			...overrides,
		},
	}
}

describe('JiraIssueService', () => {
	let service: JiraIssueService
	let client: {
		createIssue: ReturnType<typeof vi.fn>
		updateIssue: ReturnType<typeof vi.fn>
		searchIssues: ReturnType<typeof vi.fn>
		addComment: ReturnType<typeof vi.fn>
		findUserByEmail: ReturnType<typeof vi.fn>
		testConnection: ReturnType<typeof vi.fn>
	}

	beforeEach(() => {
		client = {
			createIssue: vi.fn(),
			updateIssue: vi.fn(),
			searchIssues: vi.fn(),
			addComment: vi.fn(),
			findUserByEmail: vi.fn(),
			testConnection: vi.fn(),
		}
		vi.mocked(JiraApiClient).mockImplementation(() => client as unknown as JiraApiClient)

		service = new JiraIssueService(createSite(), { converter: { maxNestingDepth: 5 } })
	})

	it('should configure the client from the site', () => {
		expect(JiraApiClient).toHaveBeenCalledWith({
			host: 'https://mycompany.atlassian.net/',
			username: 'user@example.com',
			apiToken: 'test-api-token',
			converter: { maxNestingDepth: 5 },
		})
	})

	describe('createIssue', () => {
		it('should return the browse URL of the created issue', async () => {
			client.createIssue.mockResolvedValue({ id: '10002', key: 'PROJ-7' })

			const result = await service.createIssue({ project: 'PROJ', summary: 'Title', description: '**Body**' })

			expect(result).toEqual({ id: '10002', key: 'PROJ-7', url: 'https://mycompany.atlassian.net/browse/PROJ-7' })
			expect(client.createIssue).toHaveBeenCalledWith({
				projectKey: 'PROJ',
				summary: 'Title',
				description: '**Body**',
				issueType: 'Task',
			})
		})

		it('should resolve an email assignee to an account id', async () => {
			client.findUserByEmail.mockResolvedValue('acc-42')
			client.createIssue.mockResolvedValue({ id: '1', key: 'PROJ-1' })

			await service.createIssue({ project: 'PROJ', summary: 'T', description: '', assignee: 'dev@example.com', issueType: 'Bug' })

			expect(client.findUserByEmail).toHaveBeenCalledWith('dev@example.com')
			expect(client.createIssue).toHaveBeenCalledWith(expect.objectContaining({ assigneeAccountId: 'acc-42', issueType: 'Bug' }))
		})

		it('should use an assignee without "@" as an account id', async () => {
			client.createIssue.mockResolvedValue({ id: '1', key: 'PROJ-1' })

			await service.createIssue({ project: 'PROJ', summary: 'T', description: '', assignee: 'acc-7' })

			expect(client.findUserByEmail).not.toHaveBeenCalled()
			expect(client.createIssue).toHaveBeenCalledWith(expect.objectContaining({ assigneeAccountId: 'acc-7' }))
		})

		it('should fail when the assignee email matches no user', async () => {
			client.findUserByEmail.mockResolvedValue(null)

			await expect(
				service.createIssue({ project: 'PROJ', summary: 'T', description: '', assignee: 'ghost@example.com' }),
			).rejects.toThrow(new JiraServiceError('No Jira user found for assignee ghost@example.com'))
			expect(client.createIssue).not.toHaveBeenCalled()
		})
	})

	describe('updateIssue', () => {
		it('should send only the supplied fields and report them', async () => {
			client.updateIssue.mockResolvedValue(undefined)

			const result = await service.updateIssue({ issueKey: 'PROJ-5', description: 'New body', additionalFields: { labels: ['a'] } })

			expect(client.updateIssue).toHaveBeenCalledWith('PROJ-5', { description: 'New body', additionalFields: { labels: ['a'] } })
			expect(result).toEqual({
				key: 'PROJ-5',
				url: 'https://mycompany.atlassian.net/browse/PROJ-5',
				updatedFields: ['description', 'labels'],
			})
		})

		it('should reject an update with no fields', async () => {
			await expect(service.updateIssue({ issueKey: 'PROJ-5' })).rejects.toThrow('No fields provided to update')
			expect(client.updateIssue).not.toHaveBeenCalled()
		})
	})

	describe('searchIssues', () => {
		it('should flatten issues and extract plain text descriptions', async () => {
			client.searchIssues.mockResolvedValue([createJiraIssue()])

			const result = await service.searchIssues('project = PROJ', 10)

			expect(client.searchIssues).toHaveBeenCalledWith('project = PROJ', 10)
			expect(result).toEqual([
				{
					key: 'PROJ-101',
					summary: 'Child task',
					project: 'My Project',
					issueType: 'Task',
					status: 'In Progress',
					priority: 'Medium',
					assignee: 'Sam Lee',
					created: '2024-01-01T00:00:00.000Z',
					updated: '2024-01-02T00:00:00.000Z',
					url: 'https://mycompany.atlassian.net/browse/PROJ-101',
					description: 'First line\nSecond',
				},
			])
		})

		it('should use null for missing fields', async () => {
			client.searchIssues.mockResolvedValue([
				createJiraIssue({ description: null, priority: null, assignee: null, project: { key: 'PROJ' } }),
			])

			const [issue] = await service.searchIssues('project = PROJ', 10)

			expect(issue).toMatchObject({ project: 'PROJ', priority: null, assignee: null, description: null })
		})
	})

	describe('addComment', () => {
		it('should return the comment id and a focused URL', async () => {
			client.addComment.mockResolvedValue({ id: '500' })

			const result = await service.addComment('PROJ-1', 'Hello')

			expect(client.addComment).toHaveBeenCalledWith('PROJ-1', 'Hello')
			expect(result).toEqual({ id: '500', url: 'https://mycompany.atlassian.net/browse/PROJ-1?focusedCommentId=500' })
		})
	})
})
