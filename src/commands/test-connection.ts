import { getActiveSite, SettingsManager } from '../lib/SettingsManager.js'
import { JiraIssueService } from '../lib/providers/jira/index.js'
import type { JiraSite } from '../types/jira.js'
import { getLogger } from '../utils/logger-context.js'

export interface ConnectionResult {
  alias: string
  url: string
  connected: boolean
}

export type ConnectionTester = (site: JiraSite) => Promise<boolean>

/**
 * TestConnectionCommand: check the credentials of one configured site against /myself
 */
export class TestConnectionCommand {
  private readonly settingsManager: SettingsManager
  private readonly testSite: ConnectionTester

  constructor(settingsManager?: SettingsManager, testSite?: ConnectionTester) {
    this.settingsManager = settingsManager ?? new SettingsManager()
    this.testSite = testSite ?? (async (site) => new JiraIssueService(site).testConnection())
  }

  async execute(siteAlias: string | undefined, options: { config?: string } = {}): Promise<ConnectionResult> {
    const settings = await this.settingsManager.loadSettings(options.config)
    const site = getActiveSite(settings, siteAlias)

    getLogger().info(`Testing connection to ${site.url} as ${site.email}...`)
    const connected = await this.testSite(site)

    return { alias: site.alias, url: site.url, connected }
  }
}
