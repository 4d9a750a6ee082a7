import { performance } from 'perf_hooks'
import type { Response } from 'express'
import { asyncHandler } from '../middleware/errorHandler'
import { validateQrRequest } from '../middleware/validation'
import type { QrRenderer } from '../services/qrRenderer'
import type { RenderPool } from '../services/renderPool'
import { logger } from '../utils/logger'
import type { AuthenticatedRequest, QrBase64Response } from '../types'

export const createQrController = (renderer: QrRenderer, pool: RenderPool) => {
  /**
   * @desc    Render a QR code for the posted data
   * @route   POST /v1/qr-code
   * @access  Private
   */
  const generateQrCode = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const request = validateQrRequest(req.body)

    const { rendered, elapsedMs } = await pool.run(async () => {
      const started = performance.now()
      const rendered = await renderer.render(request)
      return { rendered, elapsedMs: performance.now() - started }
    })

    logger.debug('QR generated', {
      subject: req.subject?.username,
      dataLength: request.data.length,
      size: request.size,
      format: request.format,
      errorCorrection: request.errorCorrection,
      generationTimeMs: Number(elapsedMs.toFixed(2))
    })

    res.set({
      'X-Generation-Time-Ms': elapsedMs.toFixed(2),
      'X-QR-Size': request.size,
      'X-Error-Correction': request.errorCorrection,
      'X-Output-Format': request.outputEncoding
    })

    if (request.outputEncoding === 'base64') {
      const response: QrBase64Response = {
        data: rendered.body.toString('base64'),
        format: request.format,
        encoding: 'base64',
        size: request.size,
        error_correction: request.errorCorrection
      }
      res.json(response)
      return
    }

    res.type(rendered.contentType).send(rendered.body)
  })

  return { generateQrCode }
}
