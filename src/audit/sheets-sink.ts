/**
 * Google Sheets audit sink.
 *
 * Appends one row per resolved approval to a spreadsheet tab. The header
 * row is written once if the tab is empty.
 */

import { google, type sheets_v4 } from 'googleapis'
import { AUDIT_HEADERS, toSheetRow, type AuditRow, type AuditSink } from './audit-sink.js'

export interface SheetsSinkOptions {
  credentialsFile: string
  spreadsheetId: string
  sheetName: string
}

export class SheetsAuditSink implements AuditSink {
  private readonly sheets: sheets_v4.Sheets

  constructor(private readonly opts: SheetsSinkOptions, sheets?: sheets_v4.Sheets) {
    this.sheets = sheets ?? google.sheets({
      version: 'v4',
      auth: new google.auth.GoogleAuth({
        keyFile: opts.credentialsFile,
        scopes: ['https://www.googleapis.com/auth/spreadsheets'],
      }),
    })
  }

  private get range(): string {
    return `'${this.opts.sheetName}'!A:G`
  }

  async ensureHeaders(): Promise<void> {
    const existing = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.opts.spreadsheetId,
      range: `'${this.opts.sheetName}'!A1:G1`,
    })
    if (existing.data.values?.length) return

    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.opts.spreadsheetId,
      range: `'${this.opts.sheetName}'!A1:G1`,
      valueInputOption: 'RAW',
      requestBody: { values: [AUDIT_HEADERS] },
    })
    console.log(`[Audit] Wrote header row to ${this.opts.sheetName}`)
  }

  async append(row: AuditRow): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.opts.spreadsheetId,
      range: this.range,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: [toSheetRow(row)] },
    })
  }
}
