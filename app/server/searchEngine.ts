// purpose: client for the external TaxoTagger search service
// inputs: path of a FASTA file, embedding model id, matches per sequence
// outputs: raw matches keyed by taxonomy level, submitted sequence, rank
// status: experimental

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import axios, { type AxiosInstance } from 'axios'
import { z } from 'zod'

import type { EmbeddingModel, RawSearchResults } from '../types'
import { loadServerConfig, type ServerConfig } from './config'

export interface SearchEngine {
  search(filePath: string, modelId: EmbeddingModel, limit: number): Promise<RawSearchResults>
}

const matchSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  distance: z.number(),
  // Non-level attributes may be any JSON value; levels are read as strings downstream.
  entity: z.record(z.string(), z.unknown()),
})

export const rawSearchResultsSchema = z.record(z.string(), z.array(z.array(matchSchema)))

export class HttpSearchEngine implements SearchEngine {
  constructor(private readonly client: AxiosInstance) {}

  async search(filePath: string, modelId: EmbeddingModel, limit: number): Promise<RawSearchResults> {
    const content = await readFile(filePath, 'utf8')
    const form = new FormData()
    form.append('file', new Blob([content], { type: 'text/plain' }), basename(filePath))
    form.append('model_id', modelId)
    form.append('limit', String(limit))

    const response = await this.client.post<unknown>('/search', form)
    return rawSearchResultsSchema.parse(response.data)
  }
}

export const createSearchEngine = (config: ServerConfig = loadServerConfig()): SearchEngine =>
  new HttpSearchEngine(axios.create({ baseURL: config.taxotaggerApiUrl }))

let engine: SearchEngine | null = null

// One engine per server process.
export function getSearchEngine(): SearchEngine {
  if (!engine) engine = createSearchEngine()
  return engine
}
