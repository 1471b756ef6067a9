// purpose: flatten assembled results into the downloadable CSV table
// status: stable

import type { ResultsBySequence } from '../types'
import { capitalize } from './taxonomy'

export type CsvValue = string | number
export type CsvRow = Record<string, CsvValue>

export function resultColumns(levels: readonly string[]): string[] {
  const columns = ['Sequence_ID', 'Rank']
  for (const level of levels) {
    const name = capitalize(level)
    columns.push(name, `${name}_Hit`, `${name}_Similarity`)
  }
  return columns
}

/**
 * One row per (sequence, rank), following `seqIds` order. Similarity keeps
 * full precision; `missing` cells leave hit and similarity blank.
 */
export function flattenRecords(
  resultsBySeq: ResultsBySequence,
  seqIds: readonly string[],
  levels: readonly string[]
): CsvRow[] {
  const rows: CsvRow[] = []
  for (const sequenceId of seqIds) {
    for (const record of resultsBySeq[sequenceId] ?? []) {
      const row: CsvRow = { Sequence_ID: record.sequenceId, Rank: record.rank }
      for (const level of levels) {
        const name = capitalize(level)
        const cell = record.levels[level]
        row[name] = cell?.label ?? ''
        row[`${name}_Hit`] = !cell || cell.status === 'missing' ? '' : cell.hit
        row[`${name}_Similarity`] = !cell || cell.status === 'missing' ? '' : cell.similarity
      }
      rows.push(row)
    }
  }
  return rows
}

const escapeField = (value: CsvValue): string => {
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function toCsv(columns: readonly string[], rows: readonly CsvRow[]): string {
  const lines = [columns.map(escapeField).join(',')]
  for (const row of rows) {
    lines.push(columns.map((column) => escapeField(row[column] ?? '')).join(','))
  }
  return lines.join('\n') + '\n'
}

export function parseCsv(text: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let quoted = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"'
        i++
      } else if (char === '"') {
        quoted = false
      } else {
        field += char
      }
      continue
    }

    if (char === '"') {
      quoted = true
    } else if (char === ',') {
      row.push(field)
      field = ''
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++
      row.push(field)
      rows.push(row)
      row = []
      field = ''
    } else {
      field += char
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field)
    rows.push(row)
  }
  return rows
}

const pad = (value: number): string => String(value).padStart(2, '0')

// taxotagger_results_YYYY-MM-DD_HH.MM.SS.csv in local time
export function resultsFileName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`
  return `taxotagger_results_${day}_${time}.csv`
}

export function resultsToCsv(
  resultsBySeq: ResultsBySequence,
  seqIds: readonly string[],
  levels: readonly string[]
): string {
  return toCsv(resultColumns(levels), flattenRecords(resultsBySeq, seqIds, levels))
}
