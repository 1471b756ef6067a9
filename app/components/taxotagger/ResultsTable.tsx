import { useMemo } from 'react'
import type { ResultRecord } from '../../types'
import { formatDisplayRows } from '../../utils/results'
import { capitalize } from '../../utils/taxonomy'

export interface ResultsTableProps {
  records: ResultRecord[]
  levels: string[]
}

export default function ResultsTable({ records, levels }: ResultsTableProps) {
  const rows = useMemo(() => formatDisplayRows(records, levels), [records, levels])
  const columns = levels.map(capitalize)

  return (
    <div className="overflow-x-auto">
      <table className="min-w-full table-auto border-collapse text-sm">
        <thead>
          <tr>
            <th className="border px-2 py-1 text-left">Rank</th>
            {columns.map((column) => (
              <th key={column} className="border px-2 py-1 text-left">
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.rank}>
              <td className="border px-2 py-1 text-right">{row.rank}</td>
              {columns.map((column) => (
                <td key={column} className="border px-2 py-1">
                  {row.cells[column]}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
