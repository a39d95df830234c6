import { describe, it, expect } from 'vitest'
import { formatIssueSummary, formatSearchResults } from './jira.js'
import type { IssueSummary } from '../lib/providers/jira/index.js'

function createIssue(overrides: Partial<IssueSummary> = {}): IssueSummary {
  return {
    key: 'PROJ-1',
    summary: 'Fix login',
    project: 'Project',
    issueType: 'Bug',
    status: 'To Do',
    priority: 'High',
    assignee: 'Alex Doe',
    created: '2024-01-01T00:00:00.000Z',
    updated: '2024-01-02T00:00:00.000Z',
    url: 'https://example.atlassian.net/browse/PROJ-1',
    description: null,
    ...overrides,
  }
}

describe('jira utils', () => {
  describe('formatIssueSummary', () => {
    it('should render every field with fallbacks for missing values', () => {
      const text = formatIssueSummary(createIssue({ priority: null, assignee: null, description: 'Steps to reproduce' }))

      expect(text.split('\n')).toEqual([
        '**PROJ-1**: Fix login',
        '  - **Project**: Project',
        '  - **Type**: Bug',
        '  - **Status**: To Do',
        '  - **Priority**: N/A',
        '  - **Assignee**: Unassigned',
        '  - **Created**: 2024-01-01T00:00:00.000Z',
        '  - **Updated**: 2024-01-02T00:00:00.000Z',
        '  - **URL**: https://example.atlassian.net/browse/PROJ-1',
        '  - **Description**: Steps to reproduce',
      ])
    })
  })

  describe('formatSearchResults', () => {
    it('should report an empty result', () => {
      expect(formatSearchResults('project = X', [])).toBe('No issues found for query: project = X')
    })

    it('should separate issues with blank lines', () => {
      const text = formatSearchResults('project = PROJ', [createIssue(), createIssue({ key: 'PROJ-2' })])

      expect(text.startsWith('Found 2 issues:\n\n**PROJ-1**: Fix login\n')).toBe(true)
      expect(text).toContain('/browse/PROJ-1\n\n**PROJ-2**: Fix login')
    })
  })
})
