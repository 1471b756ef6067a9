import React from 'react'
import { cn } from '../../utils/cn'
import { Spinner } from './Loading'

export interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'secondary'
  loading?: boolean
  fullWidth?: boolean
  children: React.ReactNode
}

const variants = {
  primary:
    'bg-primary-500 text-white hover:bg-primary-600 active:bg-primary-700 focus:ring-primary-500 shadow-sm disabled:hover:bg-primary-500',
  secondary:
    'bg-transparent text-primary-600 border border-primary-500 hover:bg-primary-50 focus:ring-primary-500 disabled:hover:bg-transparent',
}

const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  (
    { className, variant = 'primary', loading = false, fullWidth = false, disabled, type = 'button', children, ...props },
    ref
  ) => (
    <button
      ref={ref}
      type={type}
      className={cn(
        'inline-flex items-center justify-center px-4 py-3 text-sm font-medium rounded-md transition-colors focus:outline-none focus:ring-2 focus:ring-offset-2 disabled:opacity-50 disabled:cursor-not-allowed',
        variants[variant],
        fullWidth && 'w-full',
        className
      )}
      disabled={disabled || loading}
      aria-busy={loading || undefined}
      {...props}
    >
      {loading && <Spinner size="sm" className="-ml-1 mr-2" />}
      {children}
    </button>
  )
)

Button.displayName = 'Button'

export { Button }
