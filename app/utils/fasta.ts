// purpose: parse and validate FASTA submissions before they reach the search engine
// inputs: raw FASTA text pasted or concatenated from uploaded files
// outputs: ordered sequence identifiers or a typed validation failure
// status: stable

import { MAX_SEQUENCES } from './taxonomy'

export const FASTA_HEADER_PREFIX = '>'

export type FastaValidationErrorKind =
  | 'parse'
  | 'duplicate-identifier'
  | 'malformed-header'
  | 'too-many-records'

export class FastaValidationError extends Error {
  readonly kind: FastaValidationErrorKind

  constructor(kind: FastaValidationErrorKind, message: string) {
    super(message)
    this.name = 'FastaValidationError'
    this.kind = kind
  }
}

export class ParseError extends FastaValidationError {
  constructor(message: string) {
    super('parse', message)
    this.name = 'ParseError'
  }
}

export class DuplicateIdentifierError extends FastaValidationError {
  readonly identifier: string

  constructor(identifier: string) {
    super(
      'duplicate-identifier',
      `Duplicate sequence ID found: ${identifier}\n\nPlease ensure all sequence IDs are unique.`
    )
    this.name = 'DuplicateIdentifierError'
    this.identifier = identifier
  }
}

export class MalformedHeaderError extends FastaValidationError {
  constructor() {
    super(
      'malformed-header',
      `Invalid FASTA header(s) found. Please ensure that each header starts with '${FASTA_HEADER_PREFIX}' plus at least one more non-empty character.`
    )
    this.name = 'MalformedHeaderError'
  }
}

export class TooManyRecordsError extends FastaValidationError {
  readonly count: number
  readonly limit: number

  constructor(count: number, limit: number = MAX_SEQUENCES) {
    super('too-many-records', `Please limit the number of sequences to ${limit} or fewer.`)
    this.name = 'TooManyRecordsError'
    this.count = count
    this.limit = limit
  }
}

export interface FastaRecord {
  header: string
  id: string
  sequence: string
}

export type FastaValidationResult =
  | { ok: true; seqIds: string[]; records: FastaRecord[]; count: number }
  | { ok: false; error: FastaValidationError }

/**
 * Reads FASTA text into an insertion-ordered header -> sequence map.
 * Headers keep their leading `>`; wrapped sequence lines are concatenated.
 *
 * @throws ParseError when a header repeats or sequence data precedes the first header
 */
export function parseFasta(text: string): Map<string, string> {
  const records = new Map<string, string>()
  let current: string | null = null

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    if (line.startsWith(FASTA_HEADER_PREFIX)) {
      if (records.has(line)) {
        throw new ParseError(
          `Duplicate FASTA header found: ${line}\n\nPlease ensure all FASTA headers are unique.`
        )
      }
      records.set(line, '')
      current = line
      continue
    }

    if (current === null) {
      throw new ParseError(
        `Sequence data found before the first FASTA header.\n\nPlease ensure the input starts with a '${FASTA_HEADER_PREFIX}' header line.`
      )
    }
    records.set(current, (records.get(current) ?? '') + line)
  }

  return records
}

// First whitespace-delimited token after the header prefix.
export function parseHeaderId(header: string): string {
  const body = header.startsWith(FASTA_HEADER_PREFIX)
    ? header.slice(FASTA_HEADER_PREFIX.length)
    : header
  return body.trim().split(/\s+/)[0]
}

export function isValidHeader(header: string): boolean {
  return header.startsWith(FASTA_HEADER_PREFIX) && header.slice(FASTA_HEADER_PREFIX.length).trim().length > 0
}

export function validateFasta(text: string): FastaValidationResult {
  let parsed: Map<string, string>
  try {
    parsed = parseFasta(text)
  } catch (error) {
    if (error instanceof ParseError) return { ok: false, error }
    throw error
  }

  const seqIds: string[] = []
  const seen = new Set<string>()
  const records: FastaRecord[] = []
  for (const [header, sequence] of parsed) {
    const id = parseHeaderId(header)
    if (seen.has(id)) {
      return { ok: false, error: new DuplicateIdentifierError(id) }
    }
    seen.add(id)
    seqIds.push(id)
    records.push({ header, id, sequence })
  }

  const validHeaders = records.filter((record) => isValidHeader(record.header)).length
  if (validHeaders !== records.length) {
    return { ok: false, error: new MalformedHeaderError() }
  }

  if (records.length > MAX_SEQUENCES) {
    return { ok: false, error: new TooManyRecordsError(records.length) }
  }

  return { ok: true, seqIds, records, count: records.length }
}

export const acceptedCountMessage = (count: number): string =>
  `You provided ${count} valid sequences (max: ${MAX_SEQUENCES})`

/**
 * Joins uploaded files into one FASTA document. Each file is followed by a
 * newline so the last record of one file never runs into the next header.
 */
export async function readFastaFiles(files: ReadonlyArray<Pick<Blob, 'text'>>): Promise<string> {
  const contents = await Promise.all(files.map((file) => file.text()))
  return contents.map((content) => `${content}\n`).join('')
}
