import type { CountMismatch } from '../../types'
import { Alert } from '../ui'

export default function MismatchAlert({ mismatch }: { mismatch: CountMismatch }) {
  return (
    <div className="space-y-2">
      <Alert variant="error">
        Mismatch between number of input sequences ({mismatch.expected}) and results ({mismatch.received}).
        Some sequences may not have been processed.
      </Alert>
      {mismatch.missingIds.length > 0 && (
        <Alert variant="warning" title="The following sequences were not processed:">
          <ul className="list-disc pl-5">
            {mismatch.missingIds.map((id) => (
              <li key={id}>{id}</li>
            ))}
          </ul>
        </Alert>
      )}
    </div>
  )
}
