// purpose: REST helper for the TaxoTagger search route
// status: experimental

import api from './client'
import type { SearchRequest, SearchResponse } from '../types'

export const searchTaxonomy = async (payload: SearchRequest): Promise<SearchResponse> => {
  const response = await api.post<SearchResponse>('/api/search', payload)
  return response.data
}
