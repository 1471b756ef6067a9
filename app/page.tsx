'use client'
import { useMemo, useState } from 'react'
import { getErrorMessage } from './api/client'
import FastaInput from './components/taxotagger/FastaInput'
import MismatchAlert from './components/taxotagger/MismatchAlert'
import ResultsPanel from './components/taxotagger/ResultsPanel'
import SearchSettings from './components/taxotagger/SearchSettings'
import { Alert, Button, LoadingState } from './components/ui'
import { useSearchSession } from './hooks/useTaxonomySearch'
import { useSearchSettings } from './store/useSearchSettings'
import type { InputMethod } from './types'
import { acceptedCountMessage, validateFasta } from './utils/fasta'

const MISSING_INPUT_MESSAGE = 'Please provide FASTA input before running the analysis.'

export default function TaxoTaggerPage() {
  const [method, setMethod] = useState<InputMethod>('upload')
  const [fasta, setFasta] = useState('')
  const [inputError, setInputError] = useState<string | null>(null)
  const modelId = useSearchSettings((s) => s.modelId)
  const topN = useSearchSettings((s) => s.topN)
  const { session, run, reset, isPending, error } = useSearchSession()

  const validation = useMemo(() => (fasta.trim() ? validateFasta(fasta) : null), [fasta])
  const accepted = validation !== null && validation.ok && validation.count > 0 ? validation : null

  const handleFastaChange = (content: string) => {
    setFasta(content)
    setInputError(null)
    reset()
  }

  const handleMethodChange = (next: InputMethod) => {
    setMethod(next)
    handleFastaChange('')
  }

  const handleRun = () => {
    if (!accepted) {
      setInputError(MISSING_INPUT_MESSAGE)
      return
    }
    setInputError(null)
    run({ fasta, modelId, topN })
  }

  return (
    <div className="max-w-3xl mx-auto px-4 py-8 space-y-8">
      <FastaInput
        method={method}
        onMethodChange={handleMethodChange}
        text={fasta}
        onFastaChange={handleFastaChange}
        onReadError={setInputError}
      />

      {validation && !validation.ok && <Alert variant="error">{validation.error.message}</Alert>}
      {accepted && <p className="text-xs text-neutral-500">{acceptedCountMessage(accepted.count)}</p>}

      <SearchSettings />

      <Button fullWidth loading={isPending} disabled={validation?.ok === false} onClick={handleRun}>
        Run TaxoTagger
      </Button>

      {inputError && <Alert variant="info">{inputError}</Alert>}
      {error && <Alert variant="error">{getErrorMessage(error)}</Alert>}
      {isPending && <LoadingState title="Searching reference library" description="Embedding and matching your sequences..." />}

      {session && (
        <div className="space-y-6">
          {session.response.mismatch && <MismatchAlert mismatch={session.response.mismatch} />}
          <ResultsPanel key={session.completedAt.getTime()} session={session} />
        </div>
      )}
    </div>
  )
}
