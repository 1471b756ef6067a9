import { NextResponse } from 'next/server'
import { z } from 'zod'

import { runSearch } from '../../server/search'
import { getSearchEngine } from '../../server/searchEngine'
import type { ApiErrorBody, SearchResponse } from '../../types'
import { validateFasta } from '../../utils/fasta'
import { EMBEDDING_MODELS, TOP_N_MAX, TOP_N_MIN } from '../../utils/taxonomy'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const searchRequestSchema = z.object({
  fasta: z.string().min(1, 'FASTA input is required'),
  modelId: z.enum(EMBEDDING_MODELS),
  topN: z.number().int().min(TOP_N_MIN).max(TOP_N_MAX),
})

const errorResponse = (body: ApiErrorBody, status: number) => NextResponse.json(body, { status })

export async function POST(request: Request) {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    return errorResponse({ error: 'Request body must be valid JSON' }, 400)
  }

  const parsed = searchRequestSchema.safeParse(body)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    return errorResponse({ error: details }, 400)
  }

  const { fasta, modelId, topN } = parsed.data
  const validation = validateFasta(fasta)
  if (!validation.ok) {
    return errorResponse({ error: validation.error.message, kind: validation.error.kind }, 422)
  }
  if (validation.count === 0) {
    return errorResponse({ error: 'Please provide FASTA input before running the analysis.' }, 422)
  }

  try {
    const result: SearchResponse = await runSearch(getSearchEngine(), {
      fasta,
      seqIds: validation.seqIds,
      modelId,
      topN,
    })
    return NextResponse.json(result)
  } catch (error) {
    console.error('[taxotagger] search failed:', error)
    const message = error instanceof Error ? error.message : String(error)
    return errorResponse({ error: `TaxoTagger search failed: ${message}` }, 502)
  }
}
