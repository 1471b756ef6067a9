import { beforeEach, describe, expect, it } from 'vitest'

import { clampTopN, defaultSettings, useSearchSettings } from '../useSearchSettings'

describe('useSearchSettings store', () => {
  beforeEach(() => {
    localStorage.clear()
    useSearchSettings.setState(defaultSettings)
  })

  it('starts from the first model and two results', () => {
    const { modelId, topN } = useSearchSettings.getState()
    expect(modelId).toBe('MycoAI-CNN')
    expect(topN).toBe(2)
  })

  it('keeps the result count between 1 and 5', () => {
    useSearchSettings.getState().setTopN(9)
    expect(useSearchSettings.getState().topN).toBe(5)
    useSearchSettings.getState().setTopN(0)
    expect(useSearchSettings.getState().topN).toBe(1)
  })

  it('persists changes to localStorage', () => {
    useSearchSettings.getState().setModelId('MycoAI-BERT')
    useSearchSettings.getState().setTopN(4)
    expect(JSON.parse(localStorage.getItem('taxotagger-search-settings') ?? '{}')).toEqual({
      modelId: 'MycoAI-BERT',
      topN: 4,
    })
  })
})

describe('clampTopN', () => {
  it('rounds and falls back on non-numbers', () => {
    expect(clampTopN(3.4)).toBe(3)
    expect(clampTopN(Number.NaN)).toBe(2)
  })
})
