import type { Server } from 'http'
import type { Express } from 'express'

export interface TestServer {
  baseUrl: string
  close: () => Promise<void>
}

export async function startTestServer(app: Express): Promise<TestServer> {
  const server: Server = await new Promise((resolve, reject) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening))
    listening.once('error', reject)
  })

  const address = server.address()
  if (!address || typeof address === 'string') {
    server.close()
    throw new Error('Failed to acquire port')
  }

  const { port } = address

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()))
      })
  }
}
