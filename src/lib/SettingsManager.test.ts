import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { SettingsManager, getActiveSite, siteFromEnvironment, type JiraMcpSettings } from './SettingsManager.js'
import { ConfigurationError } from '../types/jira.js'

vi.mock('../utils/logger-context.js', () => ({
	getLogger: () => ({
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}))

const workSite = { url: 'https://work.example.test', email: 'me@example.test', apiToken: 'test-api-token' }

function createSettings(overrides: Partial<JiraMcpSettings> = {}): JiraMcpSettings {
	return {
		name: 'jira-markdown-mcp',
		sites: { work: workSite },
		converter: { maxNestingDepth: 10, maxTableColumns: 64 },
		defaults: { issueType: 'Task', searchMaxResults: 50 },
		...overrides,
	}
}

describe('SettingsManager', () => {
	let tempDir: string
	let settingsPath: string
	let manager: SettingsManager

	beforeEach(async () => {
		tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jira-mcp-settings-'))
		settingsPath = path.join(tempDir, 'settings.json')
		manager = new SettingsManager()
	})

	afterEach(async () => {
		await fs.remove(tempDir)
	})

	describe('getSettingsPath', () => {
		it('should prefer the explicit path over JIRA_MCP_CONFIG', () => {
			process.env.JIRA_MCP_CONFIG = '/env/settings.json'
			expect(manager.getSettingsPath('/cli/settings.json')).toBe('/cli/settings.json')
			expect(manager.getSettingsPath()).toBe('/env/settings.json')
		})

		it('should fall back to the user config directory', () => {
			expect(manager.getSettingsPath()).toBe(path.join(os.homedir(), '.config', 'jira-markdown-mcp', 'settings.json'))
		})
	})

	describe('loadSettings', () => {
		it('should apply defaults when no file exists', async () => {
			const settings = await manager.loadSettings(settingsPath)

			expect(settings).toEqual({
				name: 'jira-markdown-mcp',
				sites: {},
				converter: { maxNestingDepth: 10, maxTableColumns: 64 },
				defaults: { issueType: 'Task', searchMaxResults: 50 },
			})
		})

		it('should merge settings.local.json over settings.json', async () => {
			await fs.writeJson(settingsPath, { sites: { work: workSite }, converter: { maxNestingDepth: 4 } })
			await fs.writeJson(path.join(tempDir, 'settings.local.json'), {
				defaultSite: 'work',
				converter: { maxTableColumns: 8 },
			})

			const settings = await manager.loadSettings(settingsPath)

			expect(settings.defaultSite).toBe('work')
			expect(settings.converter).toEqual({ maxNestingDepth: 4, maxTableColumns: 8 })
			expect(settings.sites.work).toEqual(workSite)
		})

		it('should use JIRA_* environment variables when no site is configured', async () => {
			process.env.JIRA_URL = 'https://env.example.test'
			process.env.JIRA_EMAIL = 'env@example.test'
			process.env.JIRA_API_TOKEN = 'test-env-token'

			const settings = await manager.loadSettings(settingsPath)

			expect(settings.sites).toEqual({
				default: { url: 'https://env.example.test', email: 'env@example.test', apiToken: 'test-env-token' },
			})
		})

		it('should ignore environment variables when sites are configured', async () => {
			process.env.JIRA_URL = 'https://env.example.test'
			process.env.JIRA_EMAIL = 'env@example.test'
			process.env.JIRA_API_TOKEN = 'test-env-token'
			await fs.writeJson(settingsPath, { sites: { work: workSite } })

			const settings = await manager.loadSettings(settingsPath)

			expect(Object.keys(settings.sites)).toEqual(['work'])
		})

		it('should report every validation issue with the file path', async () => {
			await fs.writeJson(settingsPath, { sites: { work: { ...workSite, url: 'not a url' } }, unknownKey: true })

			await expect(manager.loadSettings(settingsPath)).rejects.toThrow(ConfigurationError)
			await expect(manager.loadSettings(settingsPath)).rejects.toThrow(
				`Settings validation failed at ${settingsPath}:\n  - sites.work.url: Site url must be a valid URL\n  - root: Unrecognized key(s) in object: 'unknownKey'`,
			)
		})

		it('should reject a defaultSite that names no site', async () => {
			await fs.writeJson(settingsPath, { defaultSite: 'missing', sites: { work: workSite } })

			await expect(manager.loadSettings(settingsPath)).rejects.toThrow(
				"  - defaultSite: defaultSite 'missing' does not name a configured site",
			)
		})

		it('should reject a defaultSite that only exists on Object.prototype', async () => {
			await fs.writeJson(settingsPath, { defaultSite: 'constructor', sites: { work: workSite } })

			await expect(manager.loadSettings(settingsPath)).rejects.toThrow(
				"  - defaultSite: defaultSite 'constructor' does not name a configured site",
			)
		})

		it('should report malformed JSON', async () => {
			await fs.writeFile(settingsPath, '{ nope')

			await expect(manager.loadSettings(settingsPath)).rejects.toThrow(`Failed to parse settings file at ${settingsPath}`)
		})
	})
})

describe('siteFromEnvironment', () => {
	it('should require all three variables', () => {
		expect(siteFromEnvironment({ JIRA_URL: 'https://x.example.test', JIRA_EMAIL: 'a@example.test' })).toBeNull()
	})
})

describe('getActiveSite', () => {
	it('should use the only configured site when no alias is given', () => {
		expect(getActiveSite(createSettings())).toEqual({ alias: 'work', ...workSite })
	})

	it('should prefer an explicit alias, then defaultSite', () => {
		const other = { ...workSite, url: 'https://other.example.test' }
		const settings = createSettings({ sites: { work: workSite, other }, defaultSite: 'other' })

		expect(getActiveSite(settings, 'work').url).toBe('https://work.example.test')
		expect(getActiveSite(settings).url).toBe('https://other.example.test')
	})

	it('should name the available aliases for an unknown alias', () => {
		expect(() => getActiveSite(createSettings(), 'nope')).toThrow("Unknown Jira site alias 'nope'. Available sites: work")
	})

	it('should not resolve inherited property names as aliases', () => {
		expect(() => getActiveSite(createSettings(), 'constructor')).toThrow(
			"Unknown Jira site alias 'constructor'. Available sites: work",
		)
		expect(() => getActiveSite(createSettings(), 'toString')).toThrow(ConfigurationError)
	})

	it('should ask for an alias when several sites are configured without a default', () => {
		const settings = createSettings({ sites: { a: workSite, b: workSite } })
		expect(() => getActiveSite(settings)).toThrow('Multiple Jira sites configured (a, b); pass a site alias or set defaultSite')
	})

	it('should explain how to configure a site when none exist', () => {
		expect(() => getActiveSite(createSettings({ sites: {} }))).toThrow(ConfigurationError)
	})
})
