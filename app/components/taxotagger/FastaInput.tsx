'use client'
import { useEffect, useRef, type ChangeEvent } from 'react'
import type { InputMethod } from '../../types'
import { readFastaFiles } from '../../utils/fasta'
import { MAX_SEQUENCES } from '../../utils/taxonomy'

const METHOD_OPTIONS: ReadonlyArray<{ value: InputMethod; label: string }> = [
  { value: 'upload', label: 'Upload FASTA file(s)' },
  { value: 'text', label: 'Enter FASTA text' },
]

export interface FastaInputProps {
  method: InputMethod
  onMethodChange: (method: InputMethod) => void
  text: string
  onFastaChange: (fasta: string) => void
  onReadError: (message: string) => void
}

export default function FastaInput({ method, onMethodChange, text, onFastaChange, onReadError }: FastaInputProps) {
  // Bumped on every selection, method switch and unmount; only the latest read may apply.
  const readToken = useRef(0)

  useEffect(() => {
    return () => {
      readToken.current++
    }
  }, [])

  const handleMethodChange = (next: InputMethod) => {
    readToken.current++
    onMethodChange(next)
  }

  const handleFiles = (e: ChangeEvent<HTMLInputElement>) => {
    const token = ++readToken.current
    const files = Array.from(e.target.files ?? [])
    if (files.length === 0) {
      onFastaChange('')
      return
    }
    void readFastaFiles(files).then(
      (content) => {
        if (token === readToken.current) onFastaChange(content)
      },
      (error: unknown) => {
        console.error('Failed to read FASTA files:', error)
        if (token !== readToken.current) return
        onFastaChange('')
        onReadError('Could not read the uploaded file(s). Please check they are plain-text FASTA files.')
      }
    )
  }

  return (
    <section className="space-y-3">
      <h2 className="text-lg font-semibold text-neutral-900">Enter DNA Sequence</h2>
      <div role="radiogroup" aria-label="Choose input method" className="flex gap-6">
        {METHOD_OPTIONS.map((option) => (
          <label key={option.value} className="flex items-center gap-2 text-sm">
            <input
              type="radio"
              name="input-method"
              value={option.value}
              checked={method === option.value}
              onChange={() => handleMethodChange(option.value)}
            />
            {option.label}
          </label>
        ))}
      </div>

      {method === 'text' ? (
        <div>
          <label htmlFor="fasta-text" className="block text-sm font-medium text-neutral-700 mb-2">
            Enter FASTA sequence(s):
          </label>
          <textarea
            id="fasta-text"
            value={text}
            onChange={(e) => onFastaChange(e.target.value)}
            placeholder={'>seq1\nATGC...\n>seq2\nCGTA...'}
            rows={8}
            className="w-full border border-neutral-300 rounded-md p-3 font-mono text-sm"
          />
        </div>
      ) : (
        <div>
          <label htmlFor="fasta-files" className="block text-sm font-medium text-neutral-700 mb-2">
            Upload FASTA files (max {MAX_SEQUENCES} sequences total)
          </label>
          <input id="fasta-files" type="file" multiple accept=".fasta,.fas,.fa" onChange={handleFiles} />
        </div>
      )}
    </section>
  )
}
