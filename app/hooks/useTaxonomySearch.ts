'use client'
import { useCallback, useState } from 'react'
import { useMutation } from '@tanstack/react-query'
import { searchTaxonomy } from '../api/taxotagger'
import type { SearchRequest, SearchResponse, SearchSession } from '../types'

export const useTaxonomySearch = () => {
  return useMutation({
    mutationFn: (payload: SearchRequest) => searchTaxonomy(payload),
  })
}

// Holds the results of the latest run. `reset` drops them along with any pending error.
export const useSearchSession = () => {
  const search = useTaxonomySearch()
  const [session, setSession] = useState<SearchSession | null>(null)

  const { mutate, reset: resetMutation } = search

  const run = useCallback(
    (request: SearchRequest) => {
      setSession(null)
      mutate(request, {
        onSuccess: (response: SearchResponse) =>
          setSession({ request, response, completedAt: new Date() }),
      })
    },
    [mutate]
  )

  const reset = useCallback(() => {
    setSession(null)
    resetMutation()
  }, [resetMutation])

  return {
    session,
    run,
    reset,
    isPending: search.isPending,
    error: search.error,
  }
}
