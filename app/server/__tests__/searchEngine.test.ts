// @vitest-environment node
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios'
import { ZodError } from 'zod'
import { describe, expect, it } from 'vitest'

import { withTempFasta } from '../tempFasta'
import { HttpSearchEngine } from '../searchEngine'

const engineReply = {
  genus: [[{ id: 12, distance: 0.88, entity: { genus: 'Aspergillus', species: null } }]],
}

const createEngine = (data: unknown) => {
  const requests: InternalAxiosRequestConfig[] = []
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config)
    return { data, status: 200, statusText: 'OK', headers: {}, config }
  }
  const engine = new HttpSearchEngine(axios.create({ baseURL: 'http://engine.test', adapter }))
  return { engine, requests }
}

describe('HttpSearchEngine', () => {
  it('uploads the FASTA file with the model and limit', async () => {
    const { engine, requests } = createEngine(engineReply)

    const results = await withTempFasta('>a\nATGC\n', (filePath) => engine.search(filePath, 'MycoAI-BERT', 3))

    expect(requests).toHaveLength(1)
    expect(requests[0].url).toBe('/search')
    expect(requests[0].method).toBe('post')
    const form = requests[0].data
    expect(form).toBeInstanceOf(FormData)
    if (!(form instanceof FormData)) return
    expect(form.get('model_id')).toBe('MycoAI-BERT')
    expect(form.get('limit')).toBe('3')
    const file = form.get('file')
    expect(file).toBeInstanceOf(Blob)
    if (!(file instanceof Blob)) return
    expect(await file.text()).toBe('>a\nATGC\n')

    expect(results).toEqual({
      genus: [[{ id: '12', distance: 0.88, entity: { genus: 'Aspergillus', species: null } }]],
    })
  })

  it('accepts entity attributes that are not strings', async () => {
    const { engine } = createEngine({
      genus: [[{ id: 'R1', distance: 0.5, entity: { genus: 'Mucor', taxid: 4830, synonyms: ['M. sp'] } }]],
    })

    const results = await withTempFasta('>a\nATGC\n', (filePath) => engine.search(filePath, 'MycoAI-CNN', 1))

    expect(results.genus[0][0].entity).toEqual({ genus: 'Mucor', taxid: 4830, synonyms: ['M. sp'] })
  })

  it('rejects a reply that does not match the result shape', async () => {
    const { engine } = createEngine({ genus: [[{ id: 'R1' }]] })

    await expect(
      withTempFasta('>a\nATGC\n', (filePath) => engine.search(filePath, 'MycoAI-CNN', 1))
    ).rejects.toBeInstanceOf(ZodError)
  })
})
