'use client'
import { create } from 'zustand'
import { z } from 'zod'
import type { EmbeddingModel } from '../types'
import { EMBEDDING_MODELS, TOP_N_DEFAULT, TOP_N_MAX, TOP_N_MIN } from '../utils/taxonomy'

const SETTINGS_KEY = 'taxotagger-search-settings'

const storedSettingsSchema = z.object({
  modelId: z.enum(EMBEDDING_MODELS),
  topN: z.number().int().min(TOP_N_MIN).max(TOP_N_MAX),
})

type StoredSettings = z.infer<typeof storedSettingsSchema>

interface SearchSettingsState extends StoredSettings {
  setModelId: (modelId: EmbeddingModel) => void
  setTopN: (topN: number) => void
}

export const defaultSettings: StoredSettings = {
  modelId: EMBEDDING_MODELS[0],
  topN: TOP_N_DEFAULT,
}

export const clampTopN = (value: number): number => {
  if (!Number.isFinite(value)) return TOP_N_DEFAULT
  return Math.min(TOP_N_MAX, Math.max(TOP_N_MIN, Math.round(value)))
}

const getInitialSettings = (): StoredSettings => {
  if (typeof window === 'undefined') return defaultSettings
  const stored = localStorage.getItem(SETTINGS_KEY)
  if (!stored) return defaultSettings
  try {
    const parsed = storedSettingsSchema.safeParse(JSON.parse(stored))
    return parsed.success ? parsed.data : defaultSettings
  } catch (error) {
    console.warn('Failed to parse stored search settings:', error)
    return defaultSettings
  }
}

const persist = (settings: StoredSettings) => {
  if (typeof window !== 'undefined') {
    localStorage.setItem(SETTINGS_KEY, JSON.stringify(settings))
  }
}

export const useSearchSettings = create<SearchSettingsState>((set, get) => ({
  ...getInitialSettings(),
  setModelId: (modelId) => {
    set({ modelId })
    persist({ modelId, topN: get().topN })
  },
  setTopN: (value) => {
    const topN = clampTopN(value)
    set({ topN })
    persist({ modelId: get().modelId, topN })
  },
}))
