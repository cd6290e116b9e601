/**
 * Unit tests for extraction configuration loading
 *
 * @see src/config.ts
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL, DEFAULT_ZOOM, loadExtractConfig } from '../../../src/config.js';
import { PipelineError } from '../../../src/utils/errors.js';

describe('loadExtractConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadExtractConfig({}, {})).toEqual({
      model: DEFAULT_MODEL,
      apiKeyPath: './course_api_key.txt',
      apiKeyPrefix: 'sk-',
      schemaPath: './structure.json',
      jobsPath: './jobs.json',
      zoom: DEFAULT_ZOOM,
      pageIndex: 0,
    });
  });

  it('should read values from the environment', () => {
    const config = loadExtractConfig(
      {},
      {
        EXTRACT_MODEL: 'gpt-4.1-mini',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
        EXTRACT_API_KEY_PATH: '/keys/test.txt',
        EXTRACT_ZOOM: '4',
        EXTRACT_PAGE_INDEX: '2',
      }
    );

    expect(config.model).toBe('gpt-4.1-mini');
    expect(config.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.apiKeyPath).toBe('/keys/test.txt');
    expect(config.zoom).toBe(4);
    expect(config.pageIndex).toBe(2);
  });

  it('should ignore empty environment values', () => {
    expect(loadExtractConfig({}, { EXTRACT_MODEL: '', EXTRACT_ZOOM: '' }).zoom).toBe(DEFAULT_ZOOM);
  });

  it('should let overrides win over the environment', () => {
    const config = loadExtractConfig({ zoom: 2, model: undefined }, { EXTRACT_ZOOM: '4', EXTRACT_MODEL: 'm' });
    expect(config.zoom).toBe(2);
    expect(config.model).toBe('m');
  });

  it('should reject a non-numeric zoom', () => {
    expect(() => loadExtractConfig({}, { EXTRACT_ZOOM: 'large' })).toThrow(
      'Invalid numeric env var EXTRACT_ZOOM: "large"'
    );
  });

  it('should reject a fractional page index', () => {
    try {
      loadExtractConfig({}, { EXTRACT_PAGE_INDEX: '1.5' });
    } catch (error) {
      expect(error instanceof PipelineError && error.category).toBe('CONFIGURATION_ERROR');
      expect(error instanceof Error && error.message).toBe(
        'Invalid configuration: pageIndex: Expected integer, received float'
      );
      return;
    }
    throw new Error('expected loadExtractConfig to throw');
  });

  it('should reject an invalid base URL', () => {
    expect(() => loadExtractConfig({}, { OPENAI_BASE_URL: 'not a url' })).toThrow(
      'Invalid configuration: baseUrl: Invalid url'
    );
  });
});
