import { writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { main } from '../src/cli.js';
import { RunHistory } from '../src/database/history.js';
import { tempDir } from './helpers/config.js';

function writeConfig(dir: string): string {
  const file = join(dir, 'config.yaml');
  writeFileSync(file, [
    'api:',
    '  api_key: test-secret',
    'paths:',
    `  history_file: ${join(dir, 'history.json')}`,
    'logging:',
    '  level: error',
    '',
  ].join('\n'));
  return file;
}

function printed(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => args.map(String).join(' '));
}

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print usage for help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['help'])).resolves.toBe(0);
    expect(printed(log)[0]).toBe('Usage: paper-digest [--config PATH] <command> [options]');
  });

  it('should report bad arguments and exit with 1', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(main(['generate'])).resolves.toBe(1);
    expect(printed(error)).toEqual(['Error: generate requires a paper ID']);
  });

  it('should report a missing config file', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = join(tempDir(), 'missing.yaml');

    await expect(main(['--config', missing, 'config-show'])).resolves.toBe(1);
    expect(printed(error)[0]).toContain('Config file not found');
  });

  it('should show the effective configuration', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['--config', writeConfig(tempDir()), 'config-show'])).resolves.toBe(0);

    const lines = printed(log);
    expect(lines).toContain('  Provider: siliconflow');
    expect(lines).toContain('\nAPI key: configured');
    expect(lines).toContain('  arXiv order: api_first');
  });

  it('should list recorded runs', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const dir = tempDir();
    const config = writeConfig(dir);

    await expect(main(['--config', config, 'history'])).resolves.toBe(0);
    expect(printed(log)).toEqual(['No runs recorded yet.']);

    const history = new RunHistory(join(dir, 'history.json'));
    const run = await history.startRun('2301.12345', 'full');
    await history.finishRun(run.id, { error: 'All sources failed' });
    log.mockClear();

    await expect(main(['--config', config, 'history', '--limit', '5'])).resolves.toBe(0);
    expect(printed(log)).toEqual([
      `${run.startedAt}  2301.12345   full         failed     All sources failed`,
    ]);
  });
});
