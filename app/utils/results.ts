// purpose: reshape nested engine matches into per-sequence, per-rank records
// inputs: raw search results keyed by taxonomy level, submitted sequence ids
// outputs: records for display and export plus a count-mismatch diagnostic
// status: stable

import type {
  CountMismatch,
  LevelCell,
  Match,
  RawSearchResults,
  ResultRecord,
  ResultsBySequence,
} from '../types'
import { NO_MATCH_LABEL, capitalize } from './taxonomy'

export interface AssembledResults {
  resultsBySeq: ResultsBySequence
  mismatch: CountMismatch | null
}

/**
 * Results are matched to `seqIds` by position: the engine returns one slot
 * per submitted sequence, in submission order. When the slot count differs
 * the pairing is unreliable; the mismatch is reported, not corrected.
 */
export function findCountMismatch(
  results: RawSearchResults,
  seqIds: readonly string[],
  levels: readonly string[]
): CountMismatch | null {
  const received = levels.length > 0 ? (results[levels[0]] ?? []).length : 0
  if (received === seqIds.length) return null

  const processedIds = new Set<string>()
  for (const level of levels) {
    for (const matches of results[level] ?? []) {
      for (const match of matches) {
        if (match.id) processedIds.add(match.id)
      }
    }
  }

  return {
    expected: seqIds.length,
    received,
    missingIds: seqIds.filter((id) => !processedIds.has(id)),
  }
}

// Out-of-range slots are `missing`; a present match without a string label for the level is `empty`.
export function readLevelCell(match: Match | undefined, level: string): LevelCell {
  if (match === undefined) {
    return { status: 'missing', label: NO_MATCH_LABEL }
  }
  const value = match.entity[level]
  if (typeof value !== 'string' || !value) {
    return { status: 'empty', label: '', hit: '', similarity: '' }
  }
  return { status: 'matched', label: value, hit: match.id, similarity: match.distance }
}

export function assembleResults(
  results: RawSearchResults,
  seqIds: readonly string[],
  topN: number,
  levels: readonly string[]
): AssembledResults {
  const mismatch = findCountMismatch(results, seqIds, levels)

  const resultsBySeq: ResultsBySequence = {}
  seqIds.forEach((sequenceId, i) => {
    const records: ResultRecord[] = []
    for (let j = 0; j < topN; j++) {
      const cells: Record<string, LevelCell> = {}
      for (const level of levels) {
        cells[level] = readLevelCell(results[level]?.[i]?.[j], level)
      }
      records.push({ sequenceId, rank: j + 1, levels: cells })
    }
    resultsBySeq[sequenceId] = records
  })

  return { resultsBySeq, mismatch }
}

export const roundSimilarity = (similarity: number): string =>
  String(Math.round(similarity * 1000) / 1000)

export function formatCell(cell: LevelCell): string {
  switch (cell.status) {
    case 'matched':
      return `${cell.label} (${cell.hit};${roundSimilarity(cell.similarity)})`
    case 'empty':
      return ''
    case 'missing':
      return cell.label
  }
}

export interface DisplayRow {
  rank: number
  cells: Record<string, string>
}

// View-only: builds fresh rows and leaves `records` untouched for export.
export function formatDisplayRows(
  records: readonly ResultRecord[],
  levels: readonly string[]
): DisplayRow[] {
  return records.map((record) => {
    const cells: Record<string, string> = {}
    for (const level of levels) {
      const cell = record.levels[level]
      cells[capitalize(level)] = cell ? formatCell(cell) : NO_MATCH_LABEL
    }
    return { rank: record.rank, cells }
  })
}
