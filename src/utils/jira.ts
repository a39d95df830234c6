/**
 * Jira formatting helpers for tool output
 */

import type { IssueSummary } from '../lib/providers/jira/index.js'

/**
 * Render one issue as a markdown bullet block
 */
export function formatIssueSummary(issue: IssueSummary): string {
  const lines = [
    `**${issue.key}**: ${issue.summary}`,
    `  - **Project**: ${issue.project ?? 'N/A'}`,
    `  - **Type**: ${issue.issueType ?? 'N/A'}`,
    `  - **Status**: ${issue.status ?? 'N/A'}`,
    `  - **Priority**: ${issue.priority ?? 'N/A'}`,
    `  - **Assignee**: ${issue.assignee ?? 'Unassigned'}`,
    `  - **Created**: ${issue.created ?? 'N/A'}`,
    `  - **Updated**: ${issue.updated ?? 'N/A'}`,
    `  - **URL**: ${issue.url}`,
  ]

  if (issue.description) {
    lines.push(`  - **Description**: ${issue.description}`)
  }

  return lines.join('\n')
}

/**
 * Render search results the way the search tool returns them
 */
export function formatSearchResults(query: string, issues: IssueSummary[]): string {
  if (issues.length === 0) {
    return `No issues found for query: ${query}`
  }
  return `Found ${issues.length} issues:\n\n${issues.map(formatIssueSummary).join('\n\n')}`
}
