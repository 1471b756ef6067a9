import axios, { isAxiosError } from 'axios'
import type { ApiErrorBody } from '../types'

const api = axios.create({
  baseURL: process.env.NEXT_PUBLIC_API_URL || '',
  headers: { 'Content-Type': 'application/json' },
})

const isApiErrorBody = (value: unknown): value is ApiErrorBody =>
  typeof value === 'object' &&
  value !== null &&
  'error' in value &&
  typeof value.error === 'string'

// Prefers the `{ error }` body our routes answer with over axios' status text.
export const getErrorMessage = (error: unknown): string => {
  if (isAxiosError(error)) {
    const data: unknown = error.response?.data
    if (isApiErrorBody(data)) return data.error
  }
  if (error instanceof Error) return error.message
  return String(error)
}

export default api
