import fs from 'fs/promises'
import os from 'os'
import path from 'path'

const escapePdfString = (text: string) => text.replace(/([\\()])/g, '\\$1')

/**
 * Builds a minimal PDF with one Helvetica text line per page. An empty string
 * produces a page without any text.
 */
export function buildPdf(pages: string[]): Buffer {
  const fontId = 3 + pages.length * 2
  const objects: string[] = []

  objects.push('<< /Type /Catalog /Pages 2 0 R >>')
  const kids = pages.map((_, index) => `${3 + index * 2} 0 R`).join(' ')
  objects.push(`<< /Type /Pages /Kids [${kids}] /Count ${pages.length} >>`)

  pages.forEach((text, index) => {
    const contentId = 4 + index * 2
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
      `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${contentId} 0 R >>`
    )
    const stream = text ? `BT /F1 12 Tf 72 720 Td (${escapePdfString(text)}) Tj ET` : ''
    objects.push(`<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`)
  })

  objects.push('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>')

  let body = '%PDF-1.4\n'
  const offsets: number[] = []
  objects.forEach((object, index) => {
    offsets.push(body.length)
    body += `${index + 1} 0 obj\n${object}\nendobj\n`
  })

  const xrefOffset = body.length
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`

  return Buffer.from(body, 'latin1')
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`))
}

export async function writePdf(dir: string, filename: string, pages: string[]): Promise<string> {
  const filepath = path.join(dir, filename)
  await fs.writeFile(filepath, buildPdf(pages))
  return filepath
}
