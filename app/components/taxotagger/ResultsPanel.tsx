'use client'
import { useState } from 'react'
import type { SearchSession } from '../../types'
import { resultsFileName, resultsToCsv } from '../../utils/csv'
import { downloadTextFile } from '../../utils/download'
import { Button, Select } from '../ui'
import ResultsTable from './ResultsTable'

const RESULTS_HELP =
  "The predicted taxonomy labels for each input DNA sequence are displayed below with a format of 'TaxonomyLabel (ID;COS)' in each cell. Where, 'ID' is the ID of the matched DNA sequence, and 'COS' is the cosine similarity between the input DNA sequence and the matched DNA sequence, ranging from 0 (no match) to 1 (perfect match)."

export default function ResultsPanel({ session }: { session: SearchSession }) {
  const { seqIds, levels, resultsBySeq } = session.response
  const [selectedId, setSelectedId] = useState(seqIds[0] ?? '')

  const handleDownload = () => {
    downloadTextFile(resultsToCsv(resultsBySeq, seqIds, levels), resultsFileName(session.completedAt))
  }

  return (
    <section className="space-y-4">
      <div>
        <h2 className="text-lg font-semibold text-neutral-900">Results</h2>
        <p className="text-xs text-neutral-500 mt-1">{RESULTS_HELP}</p>
      </div>
      <Select
        label="For input sequence:"
        options={seqIds}
        value={selectedId}
        onChange={(e) => setSelectedId(e.target.value)}
      />
      <ResultsTable records={resultsBySeq[selectedId] ?? []} levels={levels} />
      <Button variant="secondary" onClick={handleDownload}>
        Download all results
      </Button>
    </section>
  )
}
