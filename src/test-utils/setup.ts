import { beforeEach } from 'vitest'

// Global test setup
// Note: Mock cleanup (clearMocks, resetMocks, restoreMocks) is handled by vitest.config.ts
beforeEach(() => {
  // Reset environment variables to clean state
  delete process.env.JIRA_URL
  delete process.env.JIRA_EMAIL
  delete process.env.JIRA_API_TOKEN
  delete process.env.JIRA_MCP_CONFIG
  delete process.env.JIRA_MCP_DEBUG
})
