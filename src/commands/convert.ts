import fs from 'fs-extra'
import { markdownToAdf, type AdfDocument } from '../lib/adf/index.js'
import { SettingsManager } from '../lib/SettingsManager.js'
import { getLogger } from '../utils/logger-context.js'

export interface ConvertOptions {
  config?: string
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
  }
  return Buffer.concat(chunks).toString('utf8')
}

/**
 * ConvertCommand: markdown file (or stdin) to ADF, using the converter limits from settings
 */
export class ConvertCommand {
  private readonly settingsManager: SettingsManager
  private readonly stdin: NodeJS.ReadableStream

  constructor(settingsManager?: SettingsManager, stdin: NodeJS.ReadableStream = process.stdin) {
    this.settingsManager = settingsManager ?? new SettingsManager()
    this.stdin = stdin
  }

  async execute(file: string | undefined, options: ConvertOptions = {}): Promise<AdfDocument> {
    const settings = await this.settingsManager.loadSettings(options.config)

    let markdown: string
    if (file) {
      getLogger().debug(`Reading markdown from ${file}`)
      markdown = await fs.readFile(file, 'utf8')
    } else {
      getLogger().debug('Reading markdown from stdin')
      markdown = await readStream(this.stdin)
    }

    return markdownToAdf(markdown, settings.converter)
  }
}
