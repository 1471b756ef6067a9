import type { EmbeddingModel, SearchResponse, TaxonomyLevel } from '../types'
import { assembleResults } from '../utils/results'
import { TAXONOMY_LEVELS } from '../utils/taxonomy'
import type { SearchEngine } from './searchEngine'
import { withTempFasta } from './tempFasta'

// A validated submission. `seqIds` must be in the order the FASTA lists them.
export interface SearchSubmission {
  fasta: string
  seqIds: string[]
  modelId: EmbeddingModel
  topN: number
}

export async function runSearch(
  engine: SearchEngine,
  submission: SearchSubmission,
  levels: TaxonomyLevel[] = [...TAXONOMY_LEVELS]
): Promise<SearchResponse> {
  const { fasta, seqIds, modelId, topN } = submission
  const results = await withTempFasta(fasta, (filePath) => engine.search(filePath, modelId, topN))
  const { resultsBySeq, mismatch } = assembleResults(results, seqIds, topN, levels)

  if (mismatch) {
    console.warn(
      `[taxotagger] submitted ${mismatch.expected} sequences but received ${mismatch.received} result slots`,
      mismatch.missingIds
    )
  }

  return { seqIds, topN, modelId, levels, resultsBySeq, mismatch }
}
