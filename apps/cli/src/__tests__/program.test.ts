import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { createApp } from '@fairness-check/mock-server'
import type { FetchLike } from '@fairness-check/inference-client'
import { run, EXIT_ERROR, EXIT_OK, EXIT_VIOLATION, VERSION } from '../program'

const DATASET = 'features,label,sensitive_attribute\n1,1,A\n2,0,A\n3,1,B\n4,0,B\n'

function config(url: string): string {
  return `
endpoint:
  url: ${url}
  timeout: 5
dataset:
  path: data.csv
fairness:
  demographic_parity_threshold: 0.1
  equal_opportunity_threshold: 0.1
`
}

function capture() {
  const chunks: string[] = []
  return {
    sink: { write: (chunk: string) => chunks.push(chunk) },
    text: () => chunks.join(''),
  }
}

/** Routes inference requests into an in-process mock classifier. */
function mockFetch(random: () => number = Math.random): FetchLike {
  const app = createApp({ random })
  return async (url, init) => app.request(url, init)
}

/** Stand-in random source: 1, 1, 0, 0 for the four rows. */
function splitByGroup(): () => number {
  const values = [0.9, 0.9, 0.1, 0.1]
  let i = 0
  return () => values[i++ % values.length] ?? 0
}

async function cli(argv: string[], fetch?: FetchLike) {
  const stdout = capture()
  const stderr = capture()
  const code = await run(argv, { stdout: stdout.sink, stderr: stderr.sink, env: {}, fetch })
  return { code, stdout: stdout.text(), stderr: stderr.text() }
}

describe('fairness-check', () => {
  let dir: string
  let biased: string
  let random: string
  let missingRoute: string

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'fairness-cli-'))
    await writeFile(path.join(dir, 'data.csv'), DATASET)
    biased = path.join(dir, 'biased.yaml')
    random = path.join(dir, 'random.yaml')
    missingRoute = path.join(dir, 'missing-route.yaml')
    await writeFile(biased, config('http://mock.test/classify/biased'))
    await writeFile(random, config('http://mock.test/classify/random'))
    await writeFile(missingRoute, config('http://mock.test/nowhere'))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('--version', () => {
    it('prints the version and exits 0', async () => {
      const result = await cli(['--version'])
      expect(result.code).toBe(EXIT_OK)
      expect(result.stdout).toBe(`${VERSION}\n`)
    })
  })

  describe('validate', () => {
    it('confirms a valid file', async () => {
      const result = await cli(['validate', biased])
      expect(result.code).toBe(EXIT_OK)
      expect(result.stdout.split('\n')).toEqual([
        `✓ Configuration file '${biased}' is valid`,
        '  Endpoint: http://mock.test/classify/biased',
        `  Test dataset: ${path.join(dir, 'data.csv')}`,
        '',
      ])
    })

    it('reports a missing file', async () => {
      const missing = path.join(dir, 'nope.yaml')
      const result = await cli(['validate', missing])
      expect(result.code).toBe(EXIT_ERROR)
      expect(result.stderr).toBe(`Error: Configuration file not found: ${missing}\n`)
    })
  })

  describe('report', () => {
    it('prints the text report for a constant classifier', async () => {
      const result = await cli(['report', biased], mockFetch())
      expect(result.code).toBe(EXIT_OK)
      expect(result.stdout.split('\n')).toEqual([
        '',
        '='.repeat(60),
        'FAIRNESS TEST RESULTS',
        '='.repeat(60),
        '',
        'Total predictions: 4',
        'Accuracy: 50.00%',
        '',
        'Fairness Metrics:',
        '  demographic_parity_difference: 0.0000',
        '  equal_opportunity_difference: 0.0000',
        '',
        '✓ Demographic parity difference threshold met',
        '✓ Equal opportunity difference threshold met',
        '',
      ])
      expect(result.stderr).toBe('')
    })

    it('warns for each metric over its own threshold', async () => {
      const result = await cli(['report', random], mockFetch(splitByGroup()))
      expect(result.code).toBe(EXIT_OK)
      const lines = result.stdout.split('\n')
      expect(lines).toContain('  demographic_parity_difference: 1.0000')
      expect(lines).toContain('  equal_opportunity_difference: 1.0000')
      expect(lines).toContain('⚠️  Warning: Demographic parity difference exceeds 0.1 threshold')
      expect(lines).toContain('⚠️  Warning: Equal opportunity difference exceeds 0.1 threshold')
    })

    it('exits 2 on a violation with --fail-on-violation', async () => {
      const result = await cli(['report', random, '--fail-on-violation'], mockFetch(splitByGroup()))
      expect(result.code).toBe(EXIT_VIOLATION)
    })

    it('exits 0 with --fail-on-violation when every threshold is met', async () => {
      const result = await cli(['report', biased, '--fail-on-violation'], mockFetch())
      expect(result.code).toBe(EXIT_OK)
    })

    it('prints the report as JSON', async () => {
      const result = await cli(['report', random, '--json'], mockFetch(splitByGroup()))
      expect(result.code).toBe(EXIT_OK)
      expect(JSON.parse(result.stdout)).toEqual({
        total_predictions: 4,
        accuracy: 0.5,
        fairness_metrics: { demographic_parity_difference: 1, equal_opportunity_difference: 1 },
        thresholds_met: { demographic_parity: false, equal_opportunity: false },
        thresholds: { demographic_parity: 0.1, equal_opportunity: 0.1 },
        groups: [
          { value: 'A', size: 2, selection_rate: 1, true_positive_rate: 1 },
          { value: 'B', size: 2, selection_rate: 0, true_positive_rate: 0 },
        ],
      })
    })

    it('logs progress to stderr with --verbose', async () => {
      const result = await cli(['report', biased, '--verbose'], mockFetch())
      expect(result.code).toBe(EXIT_OK)
      const events = result.stderr
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line).event)
      expect(events).toContain('config_loaded')
      expect(events).toContain('evaluation_complete')
      expect(result.stdout.split('\n')).toContain('Groups:')
    })

    it('explains an endpoint that answers 404', async () => {
      const result = await cli(['report', missingRoute], mockFetch())
      expect(result.code).toBe(EXIT_ERROR)
      const lines = result.stderr.split('\n')
      expect(lines[0]).toMatch(/^Error: Failed to get inference from endpoint: HTTP 404\b/)
      expect(lines[1]).toBe('Hint: Check endpoint.url and endpoint.method.')
    })

    it('explains a refused connection', async () => {
      const refused: FetchLike = async () => {
        const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8000'), { code: 'ECONNREFUSED' })
        throw new TypeError('fetch failed', { cause })
      }
      const result = await cli(['report', biased], refused)
      expect(result.code).toBe(EXIT_ERROR)
      expect(result.stderr).toBe(
        'Error: Failed to get inference from endpoint: fetch failed: connect ECONNREFUSED 127.0.0.1:8000\n' +
          'Hint: Cannot connect to the endpoint. Is the classifier running?\n',
      )
    })

    it('prints the cause chain with --verbose', async () => {
      const refused: FetchLike = async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') })
      }
      const result = await cli(['report', biased, '--verbose'], refused)
      expect(result.code).toBe(EXIT_ERROR)
      expect(result.stderr).toContain('Caused by: TypeError: fetch failed')
      expect(result.stderr).toContain('Caused by: Error: connect ECONNREFUSED')
    })
  })

  describe('usage errors', () => {
    it('exits 1 on an unknown command', async () => {
      const result = await cli(['bogus'])
      expect(result.code).toBe(EXIT_ERROR)
      expect(result.stderr).toContain("unknown command 'bogus'")
    })

    it('exits 1 when the config argument is missing', async () => {
      const result = await cli(['report'])
      expect(result.code).toBe(EXIT_ERROR)
      expect(result.stderr).toContain("missing required argument 'config_file'")
    })
  })
})
