import { readFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import deepmerge from 'deepmerge'
import { getLogger } from '../utils/logger-context.js'
import { ConfigurationError, type JiraSite } from '../types/jira.js'

export const APP_NAME = 'jira-markdown-mcp'

/**
 * Zod schema for one Jira site
 */
export const SiteSettingsSchema = z
	.object({
		url: z.string().url('Site url must be a valid URL').describe('Jira Cloud base URL, e.g. https://example.atlassian.net'),
		email: z.string().min(1, 'Site email cannot be empty').describe('Account email used for Basic auth'),
		apiToken: z.string().min(1, 'Site apiToken cannot be empty').describe('Atlassian API token'),
	})
	.strict()

/**
 * Zod schema for markdown converter limits
 */
export const ConverterSettingsSchema = z.object({
	maxNestingDepth: z
		.number()
		.int()
		.min(1, 'maxNestingDepth must be >= 1')
		.max(100, 'maxNestingDepth must be <= 100')
		.default(10)
		.describe('Deepest list/blockquote nesting kept before content is flattened'),
	maxTableColumns: z
		.number()
		.int()
		.min(1, 'maxTableColumns must be >= 1')
		.max(1000, 'maxTableColumns must be <= 1000')
		.default(64)
		.describe('Widest table emitted; extra cells are dropped'),
})

/**
 * Non-defaulting variant for pre-merge validation
 */
export const ConverterSettingsSchemaNoDefaults = z
	.object({
		maxNestingDepth: z.number().int().min(1, 'maxNestingDepth must be >= 1').max(100, 'maxNestingDepth must be <= 100').optional(),
		maxTableColumns: z.number().int().min(1, 'maxTableColumns must be >= 1').max(1000, 'maxTableColumns must be <= 1000').optional(),
	})
	.strict()

/**
 * Zod schema for tool defaults
 */
export const DefaultsSettingsSchema = z.object({
	issueType: z.string().min(1, 'Default issueType cannot be empty').default('Task'),
	searchMaxResults: z.number().int().min(1).max(1000).default(50),
})

/**
 * Non-defaulting variant for pre-merge validation
 */
export const DefaultsSettingsSchemaNoDefaults = z
	.object({
		issueType: z.string().min(1, 'Default issueType cannot be empty').optional(),
		searchMaxResults: z.number().int().min(1).max(1000).optional(),
	})
	.strict()

/**
 * Zod schema for the merged settings, with defaults applied
 */
export const JiraMcpSettingsSchema = z
	.object({
		name: z.string().min(1).default(APP_NAME).describe('Server name announced to MCP clients'),
		defaultSite: z.string().min(1, "Settings 'defaultSite' cannot be empty").optional(),
		sites: z.record(z.string(), SiteSettingsSchema).default({}).describe('Jira sites keyed by alias'),
		converter: ConverterSettingsSchema.default({}),
		defaults: DefaultsSettingsSchema.default({}),
	})
	.superRefine((settings, ctx) => {
		if (settings.defaultSite !== undefined && !Object.hasOwn(settings.sites, settings.defaultSite)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['defaultSite'],
				message: `defaultSite '${settings.defaultSite}' does not name a configured site`,
			})
		}
	})

/**
 * Non-defaulting variant for pre-merge validation
 * This prevents Zod from polluting partial settings with default values before merge
 */
export const JiraMcpSettingsSchemaNoDefaults = z
	.object({
		name: z.string().min(1).optional(),
		defaultSite: z.string().min(1, "Settings 'defaultSite' cannot be empty").optional(),
		sites: z.record(z.string(), SiteSettingsSchema).optional(),
		converter: ConverterSettingsSchemaNoDefaults.optional(),
		defaults: DefaultsSettingsSchemaNoDefaults.optional(),
	})
	.strict()

export type JiraMcpSettings = z.infer<typeof JiraMcpSettingsSchema>
export type PartialJiraMcpSettings = z.infer<typeof JiraMcpSettingsSchemaNoDefaults>

/**
 * Default settings location: ~/.config/jira-markdown-mcp/settings.json
 */
export function defaultSettingsPath(): string {
	return path.join(os.homedir(), '.config', APP_NAME, 'settings.json')
}

/**
 * Site defined by JIRA_URL, JIRA_EMAIL and JIRA_API_TOKEN, when all three are set
 */
export function siteFromEnvironment(env: NodeJS.ProcessEnv = process.env): z.infer<typeof SiteSettingsSchema> | null {
	const url = env.JIRA_URL
	const email = env.JIRA_EMAIL
	const apiToken = env.JIRA_API_TOKEN
	if (!url || !email || !apiToken) return null
	return { url, email, apiToken }
}

/**
 * Pick the site to talk to: the explicit alias, else `defaultSite`, else the only configured site
 */
export function getActiveSite(settings: JiraMcpSettings, alias?: string): JiraSite {
	const aliases = Object.keys(settings.sites)
	const available = aliases.length > 0 ? aliases.join(', ') : 'none'

	const chosen = alias ?? settings.defaultSite ?? (aliases.length === 1 ? aliases[0] : undefined)
	if (chosen === undefined) {
		if (aliases.length === 0) {
			throw new ConfigurationError(
				`No Jira site configured. Add one under "sites" in ${defaultSettingsPath()} or set JIRA_URL, JIRA_EMAIL and JIRA_API_TOKEN`,
			)
		}
		throw new ConfigurationError(`Multiple Jira sites configured (${available}); pass a site alias or set defaultSite`)
	}

	const site = Object.hasOwn(settings.sites, chosen) ? settings.sites[chosen] : undefined
	if (!site) {
		throw new ConfigurationError(`Unknown Jira site alias '${chosen}'. Available sites: ${available}`)
	}
	return { alias: chosen, ...site }
}

/**
 * Loads settings.json and its sibling settings.local.json
 */
export class SettingsManager {
	/**
	 * Resolve the settings file: explicit path, then JIRA_MCP_CONFIG, then the default location
	 */
	getSettingsPath(configPath?: string): string {
		return configPath ?? process.env.JIRA_MCP_CONFIG ?? defaultSettingsPath()
	}

	/**
	 * Load settings, merging settings.local.json over the main file.
	 * Missing files are not an error; with no sites configured the JIRA_* environment variables
	 * define a site named "default".
	 */
	async loadSettings(configPath?: string): Promise<JiraMcpSettings> {
		const settingsPath = this.getSettingsPath(configPath)
		const localPath = path.join(path.dirname(settingsPath), 'settings.local.json')

		const baseSettings = await this.loadSettingsFile(settingsPath)
		getLogger().debug(`Base settings from ${settingsPath}:`, this.redact(baseSettings))

		let merged = baseSettings
		if (path.resolve(localPath) !== path.resolve(settingsPath)) {
			const localSettings = await this.loadSettingsFile(localPath)
			getLogger().debug(`Local settings from ${localPath}:`, this.redact(localSettings))
			merged = this.mergeSettings(baseSettings, localSettings)
		}

		const envSite = siteFromEnvironment()
		if (envSite && Object.keys(merged.sites ?? {}).length === 0) {
			getLogger().debug('No sites configured, using JIRA_URL/JIRA_EMAIL/JIRA_API_TOKEN as site "default"')
			merged = { ...merged, sites: { default: envSite } }
		}

		const result = JiraMcpSettingsSchema.safeParse(merged)
		if (!result.success) {
			throw this.formatAllZodErrors(result.error, settingsPath)
		}
		return result.data
	}

	/**
	 * Load and parse a single settings file
	 * Returns empty object if file doesn't exist (not an error)
	 */
	private async loadSettingsFile(settingsPath: string): Promise<PartialJiraMcpSettings> {
		let content: string
		try {
			content = await readFile(settingsPath, 'utf-8')
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
				getLogger().debug(`No settings file found at ${settingsPath}, using defaults`)
				return {}
			}
			throw error
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(content)
		} catch (error) {
			throw new ConfigurationError(
				`Failed to parse settings file at ${settingsPath}: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
			)
		}

		const validated = JiraMcpSettingsSchemaNoDefaults.safeParse(parsed)
		if (!validated.success) {
			throw this.formatAllZodErrors(validated.error, settingsPath)
		}
		return validated.data
	}

	/**
	 * Deep merge two settings objects with priority to override, replacing arrays
	 */
	private mergeSettings(base: PartialJiraMcpSettings, override: PartialJiraMcpSettings): PartialJiraMcpSettings {
		return deepmerge<PartialJiraMcpSettings>(base, override, {
			arrayMerge: (_destinationArray, sourceArray) => sourceArray,
		})
	}

	private redact(settings: PartialJiraMcpSettings): string {
		const sites = Object.fromEntries(
			Object.entries(settings.sites ?? {}).map(([alias, site]) => [alias, { ...site, apiToken: '***' }]),
		)
		return JSON.stringify({ ...settings, ...(settings.sites && { sites }) }, null, 2)
	}

	/**
	 * Format all Zod validation errors into a single error message
	 */
	private formatAllZodErrors(error: z.ZodError, settingsPath: string): ConfigurationError {
		const errorMessages = error.issues.map((issue) => {
			const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root'
			return `  - ${issuePath}: ${issue.message}`
		})

		return new ConfigurationError(`Settings validation failed at ${settingsPath}:\n${errorMessages.join('\n')}`)
	}
}
