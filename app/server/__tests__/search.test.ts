// @vitest-environment node
import { existsSync, readFileSync } from 'node:fs'
import { afterEach, describe, expect, it, vi } from 'vitest'

import type { EmbeddingModel, RawSearchResults } from '../../types'
import { runSearch } from '../search'
import type { SearchEngine } from '../searchEngine'

class FakeSearchEngine implements SearchEngine {
  calls: Array<{ filePath: string; content: string; modelId: EmbeddingModel; limit: number }> = []

  constructor(private readonly reply: RawSearchResults | Error) {}

  async search(filePath: string, modelId: EmbeddingModel, limit: number): Promise<RawSearchResults> {
    this.calls.push({ filePath, content: readFileSync(filePath, 'utf8'), modelId, limit })
    if (this.reply instanceof Error) throw this.reply
    return this.reply
  }
}

const submission = {
  fasta: '>a\nATGC\n>b\nCGTA\n',
  seqIds: ['a', 'b'],
  modelId: 'MycoAI-CNN' as const,
  topN: 1,
}

describe('runSearch', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('passes the submission through a temporary file and assembles the reply', async () => {
    const engine = new FakeSearchEngine({
      genus: [
        [{ id: 'R1', distance: 0.9, entity: { genus: 'Mucor' } }],
        [{ id: 'R2', distance: 0.8, entity: { genus: 'Rhizopus' } }],
      ],
    })

    const response = await runSearch(engine, submission, ['genus'])

    expect(engine.calls).toHaveLength(1)
    expect(engine.calls[0]).toMatchObject({ content: submission.fasta, modelId: 'MycoAI-CNN', limit: 1 })
    expect(existsSync(engine.calls[0].filePath)).toBe(false)
    expect(response).toEqual({
      seqIds: ['a', 'b'],
      topN: 1,
      modelId: 'MycoAI-CNN',
      levels: ['genus'],
      mismatch: null,
      resultsBySeq: {
        a: [{ sequenceId: 'a', rank: 1, levels: { genus: { status: 'matched', label: 'Mucor', hit: 'R1', similarity: 0.9 } } }],
        b: [{ sequenceId: 'b', rank: 1, levels: { genus: { status: 'matched', label: 'Rhizopus', hit: 'R2', similarity: 0.8 } } }],
      },
    })
  })

  it('logs a warning when the engine drops a sequence', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const engine = new FakeSearchEngine({
      genus: [[{ id: 'R1', distance: 0.9, entity: { genus: 'Mucor' } }]],
    })

    const response = await runSearch(engine, submission, ['genus'])

    expect(response.mismatch).toEqual({ expected: 2, received: 1, missingIds: ['a', 'b'] })
    expect(warn).toHaveBeenCalledWith(
      '[taxotagger] submitted 2 sequences but received 1 result slots',
      ['a', 'b']
    )
  })

  it('propagates engine failures after removing the temporary file', async () => {
    const engine = new FakeSearchEngine(new Error('index not loaded'))

    await expect(runSearch(engine, submission)).rejects.toThrow('index not loaded')
    expect(existsSync(engine.calls[0].filePath)).toBe(false)
  })
})
