import React from 'react'
import { act, renderHook, waitFor } from '@testing-library/react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { SearchResponse } from '../../types'
import { searchTaxonomy } from '../../api/taxotagger'
import { useSearchSession } from '../useTaxonomySearch'

vi.mock('../../api/taxotagger', () => ({
  searchTaxonomy: vi.fn(),
}))

const mockSearchTaxonomy = vi.mocked(searchTaxonomy)

const createClient = () =>
  new QueryClient({
    defaultOptions: {
      mutations: { retry: false },
    },
  })

const wrapper = (client: QueryClient) =>
  ({ children }: { children: React.ReactNode }) => (
    <QueryClientProvider client={client}>{children}</QueryClientProvider>
  )

const response: SearchResponse = {
  seqIds: ['a'],
  topN: 1,
  modelId: 'MycoAI-CNN',
  levels: ['genus'],
  mismatch: null,
  resultsBySeq: {
    a: [{ sequenceId: 'a', rank: 1, levels: { genus: { status: 'matched', label: 'Mucor', hit: 'R1', similarity: 0.9 } } }],
  },
}

describe('useSearchSession', () => {
  beforeEach(() => {
    mockSearchTaxonomy.mockReset()
  })

  it('stores the response of a completed run with its request', async () => {
    mockSearchTaxonomy.mockResolvedValue(response)
    const { result } = renderHook(() => useSearchSession(), { wrapper: wrapper(createClient()) })

    const request = { fasta: '>a\nATGC\n', modelId: 'MycoAI-CNN' as const, topN: 1 }
    act(() => result.current.run(request))

    await waitFor(() => expect(result.current.session).not.toBeNull())
    expect(mockSearchTaxonomy).toHaveBeenCalledWith(request)
    expect(result.current.session?.request).toEqual(request)
    expect(result.current.session?.response).toEqual(response)
  })

  it('drops the session and the error on reset', async () => {
    mockSearchTaxonomy.mockRejectedValue(new Error('TaxoTagger search failed: timeout'))
    const { result } = renderHook(() => useSearchSession(), { wrapper: wrapper(createClient()) })

    act(() => result.current.run({ fasta: '>a\nATGC\n', modelId: 'MycoAI-CNN', topN: 1 }))
    await waitFor(() => expect(result.current.error).not.toBeNull())
    expect(result.current.error?.message).toBe('TaxoTagger search failed: timeout')

    act(() => result.current.reset())
    await waitFor(() => expect(result.current.error).toBeNull())
    expect(result.current.session).toBeNull()
  })
})
