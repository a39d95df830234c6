#!/usr/bin/env node
import { InvalidArgumentError, Option, program } from 'commander'
import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { APP_NAME, SettingsManager } from './lib/SettingsManager.js'
import { SERVER_VERSION, startJiraServer, startJiraSseServer } from './mcp/jira-server.js'
import { createStderrLogger, logger } from './utils/logger.js'
import { withLogger } from './utils/logger-context.js'

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.')
  }
  return port
}

interface ServeOptions {
  config?: string
  transport: 'stdio' | 'sse'
  port: number
  host: string
}

program
  .name(APP_NAME)
  .description('MCP server for Jira issues with markdown to Atlassian Document Format conversion')
  .version(SERVER_VERSION)
  .option('--debug', 'Enable debug output (default: based on JIRA_MCP_DEBUG env var)')
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<{ debug?: boolean }>()
    const envDebug = process.env.JIRA_MCP_DEBUG === 'true'
    logger.setDebug(options.debug ?? envDebug)
  })

program
  .command('serve', { isDefault: true })
  .description('Start the MCP server on stdio, or over HTTP with server-sent events')
  .option('-c, --config <path>', 'Settings file (default: JIRA_MCP_CONFIG or ~/.config/jira-markdown-mcp/settings.json)')
  .addOption(new Option('-t, --transport <type>', 'Transport type').choices(['stdio', 'sse']).default('stdio'))
  .option('-p, --port <number>', 'Port to listen on for SSE', parsePort, 3001)
  .option('--host <host>', 'Interface to listen on for SSE', '127.0.0.1')
  .action(async (options: ServeOptions) => {
    // Logs go to stderr; with stdio, stdout carries the protocol
    const serverLogger = createStderrLogger()
    try {
      const settings = await withLogger(serverLogger, () => new SettingsManager().loadSettings(options.config))
      if (options.transport === 'sse') {
        const sseServer = await startJiraSseServer(settings, { port: options.port, host: options.host }, serverLogger)
        const shutdown = (): void => {
          sseServer.stop().then(
            () => process.exit(0),
            (error: unknown) => {
              serverLogger.error(`Failed to stop server: ${errorMessage(error)}`)
              process.exit(1)
            },
          )
        }
        process.once('SIGINT', shutdown)
        process.once('SIGTERM', shutdown)
        return
      }
      await startJiraServer(settings, serverLogger)
    } catch (error) {
      serverLogger.error(`Failed to start server: ${errorMessage(error)}`)
      process.exit(1)
    }
  })

program
  .command('convert')
  .description('Print the ADF JSON for a markdown file, or stdin when no file is given')
  .argument('[file]', 'Markdown file')
  .option('-c, --config <path>', 'Settings file supplying converter limits')
  .action(async (file: string | undefined, options: { config?: string }) => {
    const stderrLogger = createStderrLogger()
    try {
      const { ConvertCommand } = await import('./commands/convert.js')
      const document = await withLogger(stderrLogger, () => new ConvertCommand().execute(file, options))
      console.log(JSON.stringify(document, null, 2))
    } catch (error) {
      stderrLogger.error(`Failed to convert markdown: ${errorMessage(error)}`)
      process.exit(1)
    }
  })

program
  .command('sites')
  .description('List configured Jira sites')
  .option('-c, --config <path>', 'Settings file')
  .option('--json', 'Output as JSON')
  .action(async (options: { config?: string; json?: boolean }) => {
    try {
      const { SitesCommand } = await import('./commands/sites.js')
      const sites = await new SitesCommand().execute(options)

      if (options.json) {
        console.log(JSON.stringify(sites, null, 2))
        return
      }
      if (sites.length === 0) {
        logger.info('No Jira sites configured')
        return
      }
      logger.info('Configured Jira sites:')
      for (const site of sites) {
        logger.info(`  ${site.alias}${site.isDefault ? ' (default)' : ''}: ${site.url} as ${site.email}`)
      }
    } catch (error) {
      logger.error(`Failed to list sites: ${errorMessage(error)}`)
      process.exit(1)
    }
  })

program
  .command('test-connection')
  .description('Check credentials of a configured site')
  .argument('[site]', 'Site alias (default: the default site)')
  .option('-c, --config <path>', 'Settings file')
  .action(async (site: string | undefined, options: { config?: string }) => {
    try {
      const { TestConnectionCommand } = await import('./commands/test-connection.js')
      const result = await new TestConnectionCommand().execute(site, options)
      if (result.connected) {
        logger.success(`Connected to ${result.alias} (${result.url})`)
        return
      }
      logger.error(`Authentication failed for ${result.alias} (${result.url})`)
      process.exit(1)
    } catch (error) {
      logger.error(`Connection test failed: ${errorMessage(error)}`)
      process.exit(1)
    }
  })

// Parse only when run directly; resolve symlinks for npm link and global installs
const isRunDirectly = process.argv[1] !== undefined && ((): boolean => {
  try {
    return realpathSync(process.argv[1] ?? '') === fileURLToPath(import.meta.url)
  } catch {
    return true
  }
})()

if (isRunDirectly) {
  try {
    await program.parseAsync()
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`)
    process.exit(1)
  }
}

export { program }
