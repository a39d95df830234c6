import { describe, it, expect, vi } from 'vitest'
import { TestConnectionCommand } from './test-connection.js'
import { JiraMcpSettingsSchema, type SettingsManager } from '../lib/SettingsManager.js'
import { ConfigurationError } from '../types/jira.js'

vi.mock('../utils/logger-context.js', () => ({
  getLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}))

function createSettingsManager(): SettingsManager {
  const settings = JiraMcpSettingsSchema.parse({
    defaultSite: 'work',
    sites: {
      work: { url: 'https://work.atlassian.net', email: 'dev@example.com', apiToken: 'test-api-token' },
      oss: { url: 'https://oss.atlassian.net', email: 'dev@example.com', apiToken: 'test-api-token' },
    },
  })
  return { loadSettings: vi.fn().mockResolvedValue(settings) } as unknown as SettingsManager
}

describe('TestConnectionCommand', () => {
  it('tests the default site', async () => {
    const tester = vi.fn().mockResolvedValue(true)

    const result = await new TestConnectionCommand(createSettingsManager(), tester).execute(undefined)

    expect(result).toEqual({ alias: 'work', url: 'https://work.atlassian.net', connected: true })
    expect(tester).toHaveBeenCalledWith({
      alias: 'work',
      url: 'https://work.atlassian.net',
      email: 'dev@example.com',
      apiToken: 'test-api-token',
    })
  })

  it('tests the named site and reports failed authentication', async () => {
    const tester = vi.fn().mockResolvedValue(false)

    const result = await new TestConnectionCommand(createSettingsManager(), tester).execute('oss')

    expect(result).toEqual({ alias: 'oss', url: 'https://oss.atlassian.net', connected: false })
  })

  it('rejects unknown aliases', async () => {
    const command = new TestConnectionCommand(createSettingsManager(), vi.fn())

    await expect(command.execute('missing')).rejects.toThrow(ConfigurationError)
    await expect(command.execute('missing')).rejects.toThrow("Unknown Jira site alias 'missing'. Available sites: work, oss")
  })
})
