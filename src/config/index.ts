import { config as dotenvConfig } from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';

dotenvConfig();

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

const fetchOrderSchema = z.enum(['api_first', 'browser_first']);

const configSchema = z.object({
  api: z.object({
    text: z.object({
      provider: z.string().min(1).default('siliconflow'),
      baseUrl: z.string().url().default('https://api.siliconflow.cn/v1'),
      model: z.string().min(1).default('deepseek-ai/DeepSeek-V3.2'),
      // seconds
      timeout: z.number().positive().default(120),
    }).default({}),
    vl: z.object({
      provider: z.string().min(1).default('openai'),
      baseUrl: z.string().url().default('https://api.openai.com/v1'),
      model: z.string().min(1).default('gpt-4o'),
      timeout: z.number().positive().default(120),
    }).default({}),
    apiKey: z.string().default(''),
  }).default({}),

  browser: z.object({
    enabled: z.boolean().default(true),
    headless: z.boolean().default(true),
    // milliseconds
    timeout: z.number().int().positive().default(30000),
    userAgent: z.string().default(DEFAULT_USER_AGENT),
    cacheEnabled: z.boolean().default(true),
    // seconds
    cacheTtl: z.number().nonnegative().default(86400),
    cacheDir: z.string().default('./cache/html'),
    proxy: z.string().default(''),
  }).default({}),

  // Permits falling back from the browser to the direct APIs
  flexMode: z.object({
    enabled: z.boolean().default(false),
    arxivApi: z.boolean().default(true),
    papersCoolApi: z.boolean().default(false),
  }).default({}),

  arxiv: z.object({
    apiUrl: z.string().url().default('http://export.arxiv.org/api/query'),
    pdfUrl: z.string().includes('{id}').default('https://arxiv.org/pdf/{id}.pdf'),
    absUrl: z.string().includes('{id}').default('https://arxiv.org/abs/{id}'),
    userAgent: z.string().default('PaperDigestBot/1.0'),
    timeout: z.number().positive().default(30),
    order: fetchOrderSchema.default('api_first'),
  }).default({}),

  papersCool: z.object({
    baseUrl: z.string().url().default('https://papers.cool'),
    kimiEndpoint: z.string().default('/arxiv/kimi'),
    timeout: z.number().positive().default(60),
    order: fetchOrderSchema.default('api_first'),
  }).default({}),

  paths: z.object({
    cacheDir: z.string().default('./cache'),
    pdfDir: z.string().default('./cache/pdfs'),
    summariesDir: z.string().default('./cache/summaries'),
    slidesDir: z.string().default('./slides'),
    commentsDir: z.string().default('./data/comments'),
    templatesDir: z.string().default('./templates'),
    historyFile: z.string().default('./cache/history.json'),
  }).default({}),

  pdf: z.object({
    maxPages: z.number().int().nonnegative().default(0),
    maxChars: z.number().int().positive().default(50000),
    directLlm: z.boolean().default(false),
  }).default({}),

  summary: z.object({
    template: z.string().default('academic_summary.md.njk'),
    temperature: z.number().min(0).max(2).default(0.3),
    maxTokens: z.number().int().positive().default(4096),
    maxRetries: z.number().int().positive().default(3),
    mode: z.enum(['full', 'lightweight', 'two_phase']).default('full'),
    pdfEnhanceEnabled: z.boolean().default(true),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  }).default({}),
});

export type Config = z.infer<typeof configSchema>;
export type FetchOrder = z.infer<typeof fetchOrderSchema>;
export type SummaryMode = Config['summary']['mode'];
export type ProviderSettings = Config['api']['text'];

export const DEFAULT_CONFIG_FILE = 'config.yaml';

function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** YAML sections are snake_case; the schema is camelCase. */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelizeKeys);
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[snakeToCamel(key)] = camelizeKeys(inner);
    }
    return out;
  }
  return value;
}

/** `{PROVIDER}_API_KEY`, e.g. SILICONFLOW_API_KEY */
export function apiKeyEnvName(provider: string): string {
  return `${provider.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_API_KEY`;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot parse ${configPath}: ${reason}`);
  }

  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`${configPath} must contain a mapping at the top level`);
  }
  return camelizeKeys(raw);
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseConfig(data: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;

  // Environment wins over the file for secrets
  const textKey = env[apiKeyEnvName(config.api.text.provider)];
  const vlKey = env[apiKeyEnvName(config.api.vl.provider)];
  if (textKey) {
    config.api.apiKey = textKey;
  } else if (vlKey) {
    config.api.apiKey = vlKey;
  }

  if (!config.browser.proxy) {
    config.browser.proxy = env.HTTPS_PROXY || env.HTTP_PROXY || '';
  }

  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    config.logging.level = envLevel;
  }

  return config;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = path.resolve(options.configPath ?? DEFAULT_CONFIG_FILE);
  if (options.configPath && !fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }
  return parseConfig(readConfigFile(configPath), options.env ?? process.env);
}
