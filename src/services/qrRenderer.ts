import QRCode from 'qrcode'
import type { QRCodeToBufferOptions, QRCodeToStringOptionsOther } from 'qrcode'
import { PNG } from 'pngjs'
import jpeg from 'jpeg-js'
import PDFDocument from 'pdfkit'
import type { OutputFormat, QrRequest, QrSize, RenderedQr } from '../types'
import { RenderFailureError } from '../middleware/errorHandler'

export const SIZE_PIXELS: Record<QrSize, number> = {
  small: 150,
  medium: 300,
  large: 600
}

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  png: 'image/png',
  svg: 'image/svg+xml',
  jpeg: 'image/jpeg',
  pdf: 'application/pdf'
}

// Quiet zone, in modules
const MARGIN = 4
const JPEG_QUALITY = 85
// US Letter, in PDF points
const PAGE = { width: 612, height: 792 }

/**
 * Turns a validated request into image bytes. Symbol encoding belongs to the
 * `qrcode` package; this layer only picks the output container.
 */
export interface QrRenderer {
  render(request: QrRequest): Promise<RenderedQr>
}

const bufferOptions = (request: QrRequest): QRCodeToBufferOptions => ({
  type: 'png',
  width: SIZE_PIXELS[request.size],
  margin: MARGIN,
  errorCorrectionLevel: request.errorCorrection,
  color: { dark: '#000000ff', light: '#ffffffff' }
})

const svgOptions = (request: QrRequest): QRCodeToStringOptionsOther => ({
  type: 'svg',
  width: SIZE_PIXELS[request.size],
  margin: MARGIN,
  errorCorrectionLevel: request.errorCorrection,
  color: { dark: '#000000ff', light: '#ffffffff' }
})

// The symbol is never shrunk below one pixel per module; qrcode widens
// the image instead when the requested edge is too small.
const renderPng = (request: QrRequest): Promise<Buffer> =>
  QRCode.toBuffer(request.data, bufferOptions(request))

const renderSvg = async (request: QrRequest): Promise<Buffer> =>
  Buffer.from(await QRCode.toString(request.data, svgOptions(request)), 'utf8')

const renderJpeg = async (request: QrRequest): Promise<Buffer> => {
  const png = PNG.sync.read(await renderPng(request))
  return jpeg.encode({ data: png.data, width: png.width, height: png.height }, JPEG_QUALITY).data
}

const renderPdf = async (request: QrRequest): Promise<Buffer> => {
  const png = await renderPng(request)
  const edge = SIZE_PIXELS[request.size]

  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({ size: 'LETTER', margin: 0, info: { Title: 'QR Code' } })
    const chunks: Buffer[] = []

    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    doc.on('end', () => resolve(Buffer.concat(chunks)))
    doc.on('error', reject)

    doc.image(png, (PAGE.width - edge) / 2, (PAGE.height - edge) / 2, { width: edge, height: edge })
    doc.end()
  })
}

const isDataTooBig = (error: unknown): boolean =>
  error instanceof Error && /too big to be stored/i.test(error.message)

export class QrCodeRenderer implements QrRenderer {
  async render(request: QrRequest): Promise<RenderedQr> {
    try {
      return {
        body: await this.encode(request),
        contentType: CONTENT_TYPES[request.format]
      }
    } catch (error) {
      if (isDataTooBig(error)) {
        throw new RenderFailureError(
          `Data does not fit in a QR code at error correction level ${request.errorCorrection}`,
          true,
          { cause: error }
        )
      }
      throw new RenderFailureError('Failed to generate QR code', false, { cause: error })
    }
  }

  private encode(request: QrRequest): Promise<Buffer> {
    const { format } = request
    switch (format) {
      case 'png':
        return renderPng(request)
      case 'svg':
        return renderSvg(request)
      case 'jpeg':
        return renderJpeg(request)
      case 'pdf':
        return renderPdf(request)
      default: {
        const unsupported: never = format
        throw new Error(`Unsupported format: ${String(unsupported)}`)
      }
    }
  }
}
