export const TAXONOMY_LEVELS = [
  'kingdom',
  'phylum',
  'class',
  'order',
  'family',
  'genus',
  'species',
] as const

export type TaxonomyLevel = (typeof TAXONOMY_LEVELS)[number]

export const EMBEDDING_MODELS = ['MycoAI-CNN', 'MycoAI-BERT'] as const

export type EmbeddingModel = (typeof EMBEDDING_MODELS)[number]

export const MAX_SEQUENCES = 100

export const TOP_N_MIN = 1
export const TOP_N_MAX = 5
export const TOP_N_DEFAULT = 2

export const NO_MATCH_LABEL = 'No match found'

export const capitalize = (level: string): string =>
  level.length === 0 ? level : level[0].toUpperCase() + level.slice(1)

export const isEmbeddingModel = (value: string): value is EmbeddingModel =>
  EMBEDDING_MODELS.some((model) => model === value)
