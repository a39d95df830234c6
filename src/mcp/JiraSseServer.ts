import http from 'http'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js'
import type { Logger } from '../utils/logger.js'

export const SSE_PATH = '/sse'
export const MESSAGES_PATH = '/messages'

export interface JiraSseServerOptions {
	port: number
	host: string
}

/**
 * Serves MCP over HTTP with server-sent events. Every GET /sse opens a session with its own
 * McpServer; clients post JSON-RPC messages to /messages?sessionId=<id>.
 */
export class JiraSseServer {
	private server: http.Server | null = null
	private readonly transports = new Map<string, SSEServerTransport>()

	constructor(
		private readonly createMcpServer: () => McpServer,
		private readonly logger: Logger,
	) {}

	get sessionCount(): number {
		return this.transports.size
	}

	/**
	 * Listen on `host:port`. Resolves with the bound port, which differs from `port` when it is 0.
	 */
	async start(options: JiraSseServerOptions): Promise<number> {
		if (this.server !== null) {
			throw new Error('SSE server is already started')
		}

		const server = http.createServer((req, res) => {
			this.handleRequest(req, res).catch((error: unknown) => {
				const message = error instanceof Error ? error.message : String(error)
				this.logger.error(`SSE request ${req.method ?? ''} ${req.url ?? ''} failed: ${message}`)
				if (!res.headersSent) {
					res.writeHead(500).end('Internal server error')
				}
			})
		})
		this.server = server

		await new Promise<void>((resolve, reject) => {
			server.once('error', reject)
			server.listen(options.port, options.host, () => resolve())
		})

		const address = server.address()
		const port = address !== null && typeof address === 'object' ? address.port : options.port
		this.logger.info(`SSE transport listening on http://${options.host}:${port}${SSE_PATH}`)
		return port
	}

	async stop(): Promise<void> {
		if (this.server === null) {
			return
		}

		const serverToClose = this.server
		this.server = null

		for (const transport of this.transports.values()) {
			await transport.close()
		}
		this.transports.clear()

		// Open event streams would otherwise keep close() waiting
		serverToClose.closeAllConnections()
		await new Promise<void>((resolve, reject) => {
			serverToClose.close((err) => {
				if (err) reject(err)
				else resolve()
			})
		})
		this.logger.debug('SSE transport stopped')
	}

	private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const url = new URL(req.url ?? '/', 'http://localhost')

		if (req.method === 'GET' && url.pathname === SSE_PATH) {
			const transport = new SSEServerTransport(MESSAGES_PATH, res)
			const sessionId = transport.sessionId
			this.transports.set(sessionId, transport)
			transport.onclose = () => {
				this.transports.delete(sessionId)
				this.logger.debug(`SSE session ${sessionId} closed`)
			}
			this.logger.debug(`SSE session ${sessionId} opened`)
			await this.createMcpServer().connect(transport)
			return
		}

		if (req.method === 'POST' && url.pathname === MESSAGES_PATH) {
			const sessionId = url.searchParams.get('sessionId') ?? ''
			const transport = this.transports.get(sessionId)
			if (!transport) {
				res.writeHead(400).end(`Unknown session: ${sessionId}`)
				return
			}
			await transport.handlePostMessage(req, res)
			return
		}

		res.writeHead(404).end('Not found')
	}
}
