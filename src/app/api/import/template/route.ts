import { NextResponse, type NextRequest } from 'next/server'
import { todayISO } from '@/lib/analytics/period'
import { buildImportTemplate } from '@/lib/inventory/import'
import { XLSX_CONTENT_TYPE } from '@/lib/inventory/spreadsheet'
import { routeStore, xlsxResponse } from '@/lib/supabase/route-context'

export async function GET(request: NextRequest) {
  const context = await routeStore(request, 'bulk_import')
  if (!context.ok) return context.response

  try {
    return xlsxResponse(await buildImportTemplate(todayISO()), 'product-import-template.xlsx', XLSX_CONTENT_TYPE)
  } catch (error) {
    console.error('import template error:', error)
    return NextResponse.json({ error: 'Could not build the template' }, { status: 500 })
  }
}
