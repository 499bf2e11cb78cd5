import ExcelJS from 'exceljs'
import { ValidationError } from '@/lib/errors'

export type CellPlain = string | number | null

export type SheetColumn<T> = {
  header: string
  width?: number
  value: (row: T) => CellPlain
}

export type SheetSpec<T> = {
  name: string
  columns: SheetColumn<T>[]
  rows: T[]
}

export type SheetRow = {
  rowNumber: number
  values: Record<string, CellPlain>
}

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

const HEADER_FILL: ExcelJS.Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF2E7D32' } }

/** Flattens rich, formula and hyperlink cells to the value a user sees. */
export function cellToPlain(value: ExcelJS.CellValue): CellPlain {
  if (value === null || value === undefined) return null
  if (typeof value === 'number') return value
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim()
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (value instanceof Date) return value.toISOString().slice(0, 10)
  if ('richText' in value) return cellToPlain(value.richText.map((part) => part.text).join(''))
  if ('result' in value) return value.result === undefined ? null : cellToPlain(value.result)
  if ('text' in value) return cellToPlain(value.text)
  return null
}

export function headerKey(value: CellPlain): string {
  return String(value ?? '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
}

export function styleHeader(sheet: ExcelJS.Worksheet) {
  const header = sheet.getRow(1)
  header.font = { bold: true, color: { argb: 'FFFFFFFF' } }
  header.eachCell((cell) => {
    cell.fill = HEADER_FILL
  })
  sheet.views = [{ state: 'frozen', ySplit: 1 }]
}

function autoWidth(sheet: ExcelJS.Worksheet) {
  sheet.columns.forEach((column) => {
    if (column.width) return
    let longest = 10
    column.eachCell?.({ includeEmpty: false }, (cell) => {
      longest = Math.max(longest, String(cellToPlain(cell.value) ?? '').length + 2)
    })
    column.width = Math.min(longest, 50)
  })
}

export function addSheet<T>(workbook: ExcelJS.Workbook, spec: SheetSpec<T>): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet(spec.name)
  sheet.addRow(spec.columns.map((c) => c.header))
  for (const row of spec.rows) {
    sheet.addRow(spec.columns.map((c) => c.value(row)))
  }
  spec.columns.forEach((c, i) => {
    if (c.width) sheet.getColumn(i + 1).width = c.width
  })
  styleHeader(sheet)
  autoWidth(sheet)
  return sheet
}

export async function exportWorkbook<T>(spec: SheetSpec<T>): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook()
  workbook.created = new Date()
  addSheet(workbook, spec)
  return workbook.xlsx.writeBuffer()
}

/**
 * Rows of the first sheet keyed by their header (lower-case, spaces as
 * underscores). Row 1 is the header; blank rows are dropped.
 */
export async function readSheetRows(data: ArrayBuffer): Promise<SheetRow[]> {
  const workbook = new ExcelJS.Workbook()
  try {
    await workbook.xlsx.load(data)
  } catch (error) {
    console.error('readSheetRows error:', error)
    throw new ValidationError('The file is not a valid .xlsx workbook')
  }

  const sheet = workbook.worksheets[0]
  if (!sheet) throw new ValidationError('The workbook has no sheets')

  const headers = new Map<number, string>()
  sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
    const key = headerKey(cellToPlain(cell.value))
    if (key) headers.set(colNumber, key)
  })
  if (!headers.size) throw new ValidationError('The first row must hold the column names')

  const rows: SheetRow[] = []
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return
    const values: Record<string, CellPlain> = {}
    let filled = false
    for (const [colNumber, key] of headers) {
      const value = cellToPlain(row.getCell(colNumber).value)
      values[key] = value
      if (value !== null) filled = true
    }
    if (filled) rows.push({ rowNumber, values })
  })
  return rows
}
