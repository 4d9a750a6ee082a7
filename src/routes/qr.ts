import { Router } from 'express'
import { authenticateToken, requireScope } from '../middleware/auth'
import { createQrController } from '../controllers/qrController'
import { QR_SCOPE, type TokenService } from '../services/tokenService'
import type { QrRenderer } from '../services/qrRenderer'
import type { RenderPool } from '../services/renderPool'

export const createQrRoutes = (tokens: TokenService, renderer: QrRenderer, pool: RenderPool): Router => {
  const router = Router()
  const { generateQrCode } = createQrController(renderer, pool)

  router.use(authenticateToken(tokens))
  router.use(requireScope(QR_SCOPE))

  // POST /v1/qr-code - binary image, or base64 JSON with output_format=base64
  router.post('/', generateQrCode)

  return router
}

export default createQrRoutes
