import { writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { apiKeyEnvName, camelizeKeys, loadConfig, parseConfig } from '../../src/config/index.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { tempDir } from '../helpers/config.js';

describe('parseConfig', () => {
  it('should fill every section with defaults', () => {
    const config = parseConfig({}, {});

    expect(config.api.text.provider).toBe('siliconflow');
    expect(config.api.vl.model).toBe('gpt-4o');
    expect(config.api.apiKey).toBe('');
    expect(config.arxiv.order).toBe('api_first');
    expect(config.papersCool.order).toBe('api_first');
    expect(config.flexMode).toEqual({ enabled: false, arxivApi: true, papersCoolApi: false });
    expect(config.browser.cacheTtl).toBe(86400);
    expect(config.summary.mode).toBe('full');
    expect(config.summary.maxRetries).toBe(3);
    expect(config.logging).toEqual({ level: 'info', format: 'text' });
  });

  it('should take the API key from the text provider variable first', () => {
    const config = parseConfig({}, { SILICONFLOW_API_KEY: 'test-secret', OPENAI_API_KEY: 'other-secret' });
    expect(config.api.apiKey).toBe('test-secret');
  });

  it('should fall back to the vision provider variable', () => {
    const config = parseConfig({ api: { apiKey: 'file-secret' } }, { OPENAI_API_KEY: 'test-secret' });
    expect(config.api.apiKey).toBe('test-secret');
  });

  it('should keep the file key when no variable is set', () => {
    const config = parseConfig({ api: { apiKey: 'file-secret' } }, {});
    expect(config.api.apiKey).toBe('file-secret');
  });

  it('should read the proxy and log level from the environment', () => {
    const config = parseConfig({}, { HTTPS_PROXY: 'http://127.0.0.1:7890', LOG_LEVEL: 'DEBUG' });
    expect(config.browser.proxy).toBe('http://127.0.0.1:7890');
    expect(config.logging.level).toBe('debug');
  });

  it('should prefer a configured proxy over the environment', () => {
    const config = parseConfig({ browser: { proxy: 'http://proxy.local:8080' } }, { HTTP_PROXY: 'http://127.0.0.1:7890' });
    expect(config.browser.proxy).toBe('http://proxy.local:8080');
  });

  it('should reject an unknown fetch order', () => {
    expect(() => parseConfig({ arxiv: { order: 'sideways' } }, {})).toThrow(ConfigurationError);
    expect(() => parseConfig({ arxiv: { order: 'sideways' } }, {})).toThrow(/arxiv\.order/);
  });

  it('should reject a PDF URL template without a placeholder', () => {
    expect(() => parseConfig({ arxiv: { pdfUrl: 'https://arxiv.org/pdf/' } }, {})).toThrow(/arxiv\.pdfUrl/);
  });
});

describe('camelizeKeys', () => {
  it('should convert nested snake_case keys', () => {
    expect(camelizeKeys({ flex_mode: { papers_cool_api: true }, list: [{ max_pages: 2 }] })).toEqual({
      flexMode: { papersCoolApi: true },
      list: [{ maxPages: 2 }],
    });
  });
});

describe('apiKeyEnvName', () => {
  it('should upper-case the provider and replace separators', () => {
    expect(apiKeyEnvName('siliconflow')).toBe('SILICONFLOW_API_KEY');
    expect(apiKeyEnvName('my-provider')).toBe('MY_PROVIDER_API_KEY');
  });
});

describe('loadConfig', () => {
  it('should read a snake_case YAML file', () => {
    const file = join(tempDir(), 'config.yaml');
    writeFileSync(file, [
      'api:',
      '  text:',
      '    provider: anthropic',
      '    base_url: https://api.anthropic.com/v1',
      'arxiv:',
      '  order: browser_first',
      'flex_mode:',
      '  enabled: true',
      'summary:',
      '  mode: two_phase',
      '',
    ].join('\n'));

    const config = loadConfig({ configPath: file, env: { ANTHROPIC_API_KEY: 'test-secret' } });

    expect(config.api.text.provider).toBe('anthropic');
    expect(config.api.text.baseUrl).toBe('https://api.anthropic.com/v1');
    expect(config.api.apiKey).toBe('test-secret');
    expect(config.arxiv.order).toBe('browser_first');
    expect(config.flexMode).toEqual({ enabled: true, arxivApi: true, papersCoolApi: false });
    expect(config.summary.mode).toBe('two_phase');
  });

  it('should treat an empty file as all defaults', () => {
    const file = join(tempDir(), 'config.yaml');
    writeFileSync(file, '');
    expect(loadConfig({ configPath: file, env: {} }).summary.template).toBe('academic_summary.md.njk');
  });

  it('should fail when an explicit file is missing', () => {
    expect(() => loadConfig({ configPath: join(tempDir(), 'missing.yaml'), env: {} })).toThrow(/Config file not found/);
  });

  it('should fail on a top-level list', () => {
    const file = join(tempDir(), 'config.yaml');
    writeFileSync(file, '- one\n- two\n');
    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(/must contain a mapping/);
  });
});
