import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

/**
 * Writes `content` to a fresh `.fasta` file, hands its path to `fn` and
 * removes the file once `fn` settles, whether it resolved or threw.
 */
export async function withTempFasta<T>(
  content: string,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'taxotagger-'))
  const filePath = join(dir, 'input.fasta')
  try {
    await writeFile(filePath, content, 'utf8')
    return await fn(filePath)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
