import React from 'react'
import { cn } from '../../utils/cn'

export type AlertVariant = 'success' | 'warning' | 'error' | 'info'

export interface AlertProps extends React.HTMLAttributes<HTMLDivElement> {
  variant?: AlertVariant
  title?: string
  children: React.ReactNode
}

const variants: Record<AlertVariant, string> = {
  success: 'bg-success-50 border-success-200 text-success-800',
  warning: 'bg-warning-50 border-warning-200 text-warning-800',
  error: 'bg-error-50 border-error-200 text-error-800',
  info: 'bg-info-50 border-info-200 text-info-800',
}

const iconPaths: Record<AlertVariant, string> = {
  success: 'M9 12l2 2 4-4m6 2a9 9 0 11-18 0 9 9 0 0118 0z',
  warning:
    'M12 9v2m0 4h.01m-6.938 4h13.856c1.54 0 2.502-1.667 1.732-2.5L13.732 4c-.77-.833-1.964-.833-2.732 0L3.732 16c-.77.833.192 2.5 1.732 2.5z',
  error: 'M10 14l2-2m0 0l2-2m-2 2l-2-2m2 2l2 2m7-2a9 9 0 11-18 0 9 9 0 0118 0z',
  info: 'M13 16h-1v-4h-1m1-4h.01M21 12a9 9 0 11-18 0 9 9 0 0118 0z',
}

const Alert = React.forwardRef<HTMLDivElement, AlertProps>(
  ({ className, variant = 'info', title, children, ...props }, ref) => (
    <div
      ref={ref}
      className={cn('p-4 rounded-md border text-sm', variants[variant], className)}
      role={variant === 'error' || variant === 'warning' ? 'alert' : 'status'}
      {...props}
    >
      <div className="flex items-start">
        <svg
          className="w-5 h-5 flex-shrink-0 mr-3"
          fill="none"
          stroke="currentColor"
          viewBox="0 0 24 24"
          aria-hidden="true"
        >
          <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d={iconPaths[variant]} />
        </svg>
        <div className="flex-grow whitespace-pre-line">
          {title && <h4 className="font-medium mb-1">{title}</h4>}
          {children}
        </div>
      </div>
    </div>
  )
)

Alert.displayName = 'Alert'

export { Alert }
