// Library exports
export * from './lib/adf/index.js'
export * from './lib/providers/jira/index.js'
export * from './lib/SettingsManager.js'
export * from './mcp/jira-server.js'

// Type exports
export * from './types/jira.js'
