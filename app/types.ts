import type { EmbeddingModel, NO_MATCH_LABEL, TaxonomyLevel } from './utils/taxonomy'

export type { EmbeddingModel, TaxonomyLevel }

// One candidate returned by the search engine for a (sequence, level, rank) slot.
export interface Match {
  id: string
  distance: number
  entity: Record<string, unknown>
}

// level -> submitted sequence position -> rank
export type RawSearchResults = Record<string, Match[][]>

export type LevelCell =
  | { status: 'matched'; label: string; hit: string; similarity: number }
  | { status: 'empty'; label: ''; hit: ''; similarity: '' }
  | { status: 'missing'; label: typeof NO_MATCH_LABEL }

export interface ResultRecord {
  sequenceId: string
  rank: number
  levels: Record<string, LevelCell>
}

export type ResultsBySequence = Record<string, ResultRecord[]>

export interface CountMismatch {
  expected: number
  received: number
  missingIds: string[]
}

export interface SearchRequest {
  fasta: string
  modelId: EmbeddingModel
  topN: number
}

export interface SearchResponse {
  seqIds: string[]
  topN: number
  modelId: EmbeddingModel
  levels: TaxonomyLevel[]
  resultsBySeq: ResultsBySequence
  mismatch: CountMismatch | null
}

export interface ApiErrorBody {
  error: string
  kind?: string
}

export type InputMethod = 'upload' | 'text'

// Lives for one submission; replaced on the next run and dropped when the input changes.
export interface SearchSession {
  request: SearchRequest
  response: SearchResponse
  completedAt: Date
}
