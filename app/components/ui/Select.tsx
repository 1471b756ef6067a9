import React, { useId } from 'react'
import { cn } from '../../utils/cn'

export interface SelectProps extends React.SelectHTMLAttributes<HTMLSelectElement> {
  label: string
  options: ReadonlyArray<string>
}

const Select = React.forwardRef<HTMLSelectElement, SelectProps>(
  ({ className, label, options, id, ...props }, ref) => {
    const generatedId = useId()
    const selectId = id || generatedId

    return (
      <div className="w-full">
        <label htmlFor={selectId} className="block text-sm font-medium text-neutral-700 mb-2">
          {label}
        </label>
        <select
          ref={ref}
          id={selectId}
          className={cn(
            'w-full px-4 py-3 text-sm bg-white border border-neutral-300 rounded-md focus:outline-none focus:ring-2 focus:border-primary-500 focus:ring-primary-500/10',
            className
          )}
          {...props}
        >
          {options.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      </div>
    )
  }
)

Select.displayName = 'Select'

export { Select }
