import { describe, it, expect } from 'vitest'
import * as publicApi from '../../src/index.js'

describe('src/index.ts public API surface', () => {
  it('exports all expected value symbols', () => {
    const expectedValues = [
      'parseConfig',
      'defaultConfig',
      'loadConfigFile',
      'sweepstatConfigSchema',
      'ConfigValidationError',
      'CONFIG_KEYS',
      'EMPTY_SUMMARY',
      'createResultEntry',
      'UnknownParameterError',
      'EmptyResultSetError',
      'parseMetricLog',
      'readMetricLog',
      'buildExtractionRules',
      'extractConfig',
      'extractConfigFromPath',
      'deriveMetric',
      'deriveAll',
      'collect',
      'groupBy',
      'summarize',
      'sortCategories',
      'availableParameters',
      'resolveAxis',
      'buildTableSections',
      'renderTable',
      'buildPlotData',
      'summarizeSweep',
      'runReport',
      'listParameters',
      'runCli',
    ]
    for (const name of expectedValues) {
      expect(publicApi, `expected "${name}" to be exported`).toHaveProperty(name)
    }
  })

  it('does not load the plot renderer eagerly', () => {
    expect(publicApi).not.toHaveProperty('SvgPlotRenderer')
    expect(publicApi).not.toHaveProperty('renderPlotSvg')
  })
})
