'use client'
import { useEffect, useState } from 'react'
import { clampTopN, useSearchSettings } from '../../store/useSearchSettings'
import { isEmbeddingModel, EMBEDDING_MODELS, TOP_N_MAX, TOP_N_MIN } from '../../utils/taxonomy'
import { Input, Select } from '../ui'

export default function SearchSettings() {
  const modelId = useSearchSettings((s) => s.modelId)
  const topN = useSearchSettings((s) => s.topN)
  const setModelId = useSearchSettings((s) => s.setModelId)
  const setTopN = useSearchSettings((s) => s.setTopN)
  // The field keeps what the user types; only in-range whole numbers reach the store until blur.
  const [topNDraft, setTopNDraft] = useState(String(topN))

  useEffect(() => {
    setTopNDraft(String(topN))
  }, [topN])

  const handleTopNChange = (value: string) => {
    setTopNDraft(value)
    const parsed = Number(value)
    if (value.trim() !== '' && Number.isInteger(parsed) && parsed >= TOP_N_MIN && parsed <= TOP_N_MAX) {
      setTopN(parsed)
    }
  }

  const handleTopNBlur = () => {
    const parsed = Number(topNDraft)
    const next = topNDraft.trim() === '' || Number.isNaN(parsed) ? topN : clampTopN(parsed)
    setTopN(next)
    setTopNDraft(String(next))
  }

  return (
    <section className="space-y-3">
      <h2 className="text-lg font-semibold text-neutral-900">Settings</h2>
      <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
        <Select
          label="Select embedding model:"
          options={EMBEDDING_MODELS}
          value={modelId}
          onChange={(e) => {
            if (isEmbeddingModel(e.target.value)) setModelId(e.target.value)
          }}
        />
        <Input
          label="Number of top matched results to display:"
          type="number"
          min={TOP_N_MIN}
          max={TOP_N_MAX}
          step={1}
          value={topNDraft}
          onChange={(e) => handleTopNChange(e.target.value)}
          onBlur={handleTopNBlur}
        />
      </div>
    </section>
  )
}
