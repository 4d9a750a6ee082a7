import path from 'path'
import Piscina from 'piscina'
import { RenderFailureError } from '../middleware/errorHandler'
import type { QrRequest, RenderedQr } from '../types'
import type { QrRenderer } from './qrRenderer'

export type WorkerRenderResult =
  | { ok: true; body: Uint8Array; contentType: string }
  | { ok: false; message: string; callerCaused: boolean; cause?: string }

// From TypeScript sources (tests, development) the worker needs tsx to load
// renderWorker.ts; the compiled build ships renderWorker.js.
const SOURCE_EXTENSION = path.extname(__filename)
const WORKER_FILE = path.join(__dirname, `renderWorker${SOURCE_EXTENSION}`)
const WORKER_EXEC_ARGV = SOURCE_EXTENSION === '.ts' ? ['--require', 'tsx/cjs'] : undefined

const isWorkerRenderResult = (value: unknown): value is WorkerRenderResult => {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return false
  }
  if (value.ok === true) {
    return 'body' in value && value.body instanceof Uint8Array &&
      'contentType' in value && typeof value.contentType === 'string'
  }
  return 'message' in value && typeof value.message === 'string' &&
    'callerCaused' in value && typeof value.callerCaused === 'boolean'
}

/**
 * Renders on a bounded pool of worker threads, so image encoding never
 * holds the event loop that serves token checks.
 */
export class WorkerQrRenderer implements QrRenderer {
  private readonly pool: Piscina

  constructor(threads: number) {
    this.pool = new Piscina({
      filename: WORKER_FILE,
      minThreads: 1,
      maxThreads: threads,
      execArgv: WORKER_EXEC_ARGV
    })
  }

  async render(request: QrRequest): Promise<RenderedQr> {
    const result: unknown = await this.pool.run(request)

    if (!isWorkerRenderResult(result)) {
      throw new RenderFailureError('Render worker returned an unexpected result', false)
    }

    if (!result.ok) {
      throw new RenderFailureError(result.message, result.callerCaused, {
        cause: result.cause === undefined ? undefined : new Error(result.cause)
      })
    }

    // Buffers arrive from the worker as plain Uint8Arrays
    const { body } = result
    return {
      body: Buffer.from(body.buffer, body.byteOffset, body.byteLength),
      contentType: result.contentType
    }
  }

  close(): Promise<void> {
    return this.pool.destroy()
  }
}
