/**
 * Engagement configuration and feature flag unit tests
 */

import { describe, test, expect, jest, afterEach } from '@jest/globals'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  DEFAULT_AUGMENTATION_MODELS,
  DEFAULT_AUGMENTATION_TIMEOUT_MS,
  loadEngagementConfig,
  readEngagementConfigFile,
} from '@/lib/config/engagement'
import { isAiAugmentationEnabled, readFlag } from '@/lib/config/featureFlags'
import { ConfigurationError } from '@/lib/utils/errors'

afterEach(() => {
  jest.restoreAllMocks()
})

describe('loadEngagementConfig', () => {
  test('fills defaults for an empty configuration', () => {
    expect(loadEngagementConfig({}, {})).toEqual({
      expectedDirectors: [],
      augmentation: {
        enabled: false,
        models: DEFAULT_AUGMENTATION_MODELS,
        timeoutMs: DEFAULT_AUGMENTATION_TIMEOUT_MS,
      },
    })
  })

  test('keeps engagement expectations', () => {
    const config = loadEngagementConfig(
      {
        entityName: 'Example Holdings Pty Ltd',
        currentYear: 2025,
        expectedDirectors: ['Jane Citizen'],
        expectedCompiler: 'Alex Accountant',
        priorRetainedEarnings: 280000,
        provisionsRowThreshold: 20,
      },
      {}
    )

    expect(config.entityName).toBe('Example Holdings Pty Ltd')
    expect(config.expectedDirectors).toEqual(['Jane Citizen'])
    expect(config.priorRetainedEarnings).toBe(280000)
    expect(config.provisionsRowThreshold).toBe(20)
  })

  test('environment overrides augmentation settings', () => {
    const config = loadEngagementConfig(
      { augmentation: { enabled: false } },
      {
        STATEMENTS_AI_AUGMENTATION: 'true',
        STATEMENTS_AI_MODELS: 'model-a, model-b,',
        STATEMENTS_AI_TIMEOUT_MS: '4500',
      }
    )

    expect(config.augmentation).toEqual({ enabled: true, models: ['model-a', 'model-b'], timeoutMs: 4500 })
  })

  test('rejects invalid fields with their paths', () => {
    let caught: unknown
    try {
      loadEngagementConfig({ currentYear: 'last year', expectedDirectors: [''] }, {})
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    expect(caught).toMatchObject({ message: 'Engagement configuration is invalid', status: 'configuration_error' })
    expect(caught instanceof ConfigurationError && caught.issues.map(issue => issue.split(':')[0])).toEqual([
      'currentYear',
      'expectedDirectors.0',
    ])
  })

  test('rejects an invalid timeout override', () => {
    expect(() => loadEngagementConfig({}, { STATEMENTS_AI_TIMEOUT_MS: 'soon' })).toThrow(
      'STATEMENTS_AI_TIMEOUT_MS is invalid'
    )
  })
})

describe('readEngagementConfigFile', () => {
  test('reads JSON from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'engagement-'))
    try {
      const path = join(dir, 'engagement.json')
      await writeFile(path, JSON.stringify({ expectedCompiler: 'Alex Accountant' }), 'utf8')
      const config = await readEngagementConfigFile(path, {})
      expect(config.expectedCompiler).toBe('Alex Accountant')
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  test('unreadable and malformed files are configuration errors', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'engagement-'))
    try {
      const missing = join(dir, 'missing.json')
      await expect(readEngagementConfigFile(missing, {})).rejects.toThrow(
        `Engagement configuration ${missing} could not be read`
      )

      const malformed = join(dir, 'malformed.json')
      await writeFile(malformed, '{ "expectedDirectors": [', 'utf8')
      await expect(readEngagementConfigFile(malformed, {})).rejects.toThrow(
        `Engagement configuration ${malformed} is not valid JSON`
      )
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})

describe('feature flags', () => {
  test('recognised values', () => {
    expect(readFlag('FLAG', { FLAG: 'TRUE' })).toBe(true)
    expect(readFlag('FLAG', { FLAG: '0' })).toBe(false)
    expect(readFlag('FLAG', {})).toBeUndefined()
  })

  test('unrecognised values are ignored with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    expect(readFlag('FLAG', { FLAG: 'maybe' })).toBeUndefined()
    expect(warn).toHaveBeenCalledWith('[FEATURE_FLAG] Ignoring unrecognised value for FLAG: maybe')
  })

  test('augmentation is off by default', () => {
    expect(isAiAugmentationEnabled({})).toBe(false)
    expect(isAiAugmentationEnabled({ STATEMENTS_AI_AUGMENTATION: '1' })).toBe(true)
  })
})
