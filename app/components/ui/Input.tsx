import React, { useId } from 'react'
import { cn } from '../../utils/cn'

export interface InputProps extends React.InputHTMLAttributes<HTMLInputElement> {
  label: string
  error?: string
  helperText?: string
}

const Input = React.forwardRef<HTMLInputElement, InputProps>(
  ({ className, label, error, helperText, id, ...props }, ref) => {
    const generatedId = useId()
    const inputId = id || generatedId

    return (
      <div className="w-full">
        <label htmlFor={inputId} className="block text-sm font-medium text-neutral-700 mb-2">
          {label}
        </label>
        <input
          ref={ref}
          id={inputId}
          className={cn(
            'w-full px-4 py-3 text-sm bg-white border rounded-md placeholder-neutral-400 focus:outline-none focus:ring-2 focus:ring-offset-0',
            error
              ? 'border-error-500 focus:border-error-500 focus:ring-error-500/10'
              : 'border-neutral-300 focus:border-primary-500 focus:ring-primary-500/10',
            className
          )}
          aria-invalid={error ? true : undefined}
          {...props}
        />
        {error && (
          <p className="mt-1 text-xs text-error-600" role="alert">
            {error}
          </p>
        )}
        {helperText && !error && <p className="mt-1 text-xs text-neutral-500">{helperText}</p>}
      </div>
    )
  }
)

Input.displayName = 'Input'

export { Input }
