import { SettingsManager } from '../lib/SettingsManager.js'

export interface SiteOutput {
  alias: string
  url: string
  email: string
  isDefault: boolean
}

/**
 * SitesCommand: list configured Jira sites. API tokens are never included.
 */
export class SitesCommand {
  private readonly settingsManager: SettingsManager

  constructor(settingsManager?: SettingsManager) {
    this.settingsManager = settingsManager ?? new SettingsManager()
  }

  async execute(options: { config?: string } = {}): Promise<SiteOutput[]> {
    const settings = await this.settingsManager.loadSettings(options.config)
    const aliases = Object.keys(settings.sites)
    const defaultAlias = settings.defaultSite ?? (aliases.length === 1 ? aliases[0] : undefined)

    return Object.entries(settings.sites).map(([alias, site]) => ({
      alias,
      url: site.url,
      email: site.email,
      isDefault: alias === defaultAlias,
    }))
  }
}
