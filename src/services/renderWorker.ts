import { QrCodeRenderer } from './qrRenderer'
import { RenderFailureError } from '../middleware/errorHandler'
import type { QrRequest } from '../types'
import type { WorkerRenderResult } from './workerRenderer'

const renderer = new QrCodeRenderer()

// Runs on a piscina worker thread. Error classes do not survive the
// thread boundary, so render failures travel back as data.
export default async function renderQr(request: QrRequest): Promise<WorkerRenderResult> {
  try {
    const { body, contentType } = await renderer.render(request)
    return { ok: true, body, contentType }
  } catch (error) {
    if (error instanceof RenderFailureError) {
      return {
        ok: false,
        message: error.message,
        callerCaused: error.callerCaused,
        cause: error.cause instanceof Error ? error.cause.message : undefined
      }
    }
    throw error
  }
}
