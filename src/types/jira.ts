// Shared Jira types and error classes

/**
 * Connection details for one Jira Cloud site
 */
export interface JiraSite {
	alias: string
	url: string // e.g., "https://example.atlassian.net"
	email: string
	apiToken: string
}

/**
 * Error raised for any failed Jira operation. `status` is the HTTP status when Jira answered.
 */
export class JiraServiceError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
		public readonly details?: unknown,
	) {
		super(message)
		this.name = 'JiraServiceError'
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, JiraServiceError)
		}
	}
}

/**
 * Error raised when settings are missing or invalid
 */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigurationError'
	}
}
