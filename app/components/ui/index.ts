export { Alert, type AlertProps, type AlertVariant } from './Alert'
export { Button, type ButtonProps } from './Button'
export { Input, type InputProps } from './Input'
export { LoadingState, Spinner, type LoadingStateProps, type SpinnerProps } from './Loading'
export { Select, type SelectProps } from './Select'
