import { describe, it, expect } from 'vitest';
import { parseArgs, parseIdList } from '../../src/lib/args.js';
import { ValidationError } from '../../src/lib/errors.js';

describe('parseArgs', () => {
  it('should show help without a command', () => {
    expect(parseArgs([])).toEqual({ configPath: undefined, command: { name: 'help' } });
    expect(parseArgs(['--help']).command).toEqual({ name: 'help' });
  });

  it('should parse generate with its defaults', () => {
    expect(parseArgs(['generate', '2301.12345']).command).toEqual({
      name: 'generate',
      paperId: '2301.12345',
      download: true,
      force: false,
      usePdfLlm: true,
      pptx: false,
      comments: [],
    });
  });

  it('should parse every generate flag', () => {
    const { configPath, command } = parseArgs([
      'generate', '2301.12345',
      '--no-download', '-f', '--no-pdf-llm', '--pptx',
      '-k', 'test-secret',
      '--comment', 'first note',
      '--config', 'alt.yaml',
      '--comment', 'second note',
    ]);

    expect(configPath).toBe('alt.yaml');
    expect(command).toEqual({
      name: 'generate',
      paperId: '2301.12345',
      download: false,
      force: true,
      usePdfLlm: false,
      pptx: true,
      apiKey: 'test-secret',
      comments: ['first note', 'second note'],
    });
  });

  it('should parse batch options', () => {
    expect(parseArgs(['--config', 'c.yaml', 'batch', 'ids.txt', '-o', 'out']).command).toEqual({
      name: 'batch',
      inputFile: 'ids.txt',
      outputDir: 'out',
      apiKey: undefined,
    });
  });

  it('should parse history with a limit', () => {
    expect(parseArgs(['history']).command).toEqual({ name: 'history', limit: 10 });
    expect(parseArgs(['history', '--limit', '3']).command).toEqual({ name: 'history', limit: 3 });
  });

  it('should reject bad input', () => {
    expect(() => parseArgs(['generate'])).toThrow('generate requires a paper ID');
    expect(() => parseArgs(['generate', '2301.12345', '--bogus'])).toThrow(ValidationError);
    expect(() => parseArgs(['generate', '2301.12345', '--comment'])).toThrow('--comment requires a value');
    expect(() => parseArgs(['batch'])).toThrow('batch requires an input file');
    expect(() => parseArgs(['history', '--limit', '0'])).toThrow('--limit must be a positive integer');
    expect(() => parseArgs(['publish'])).toThrow('Unknown command: publish');
  });
});

describe('parseIdList', () => {
  it('should skip blank lines and comments', () => {
    expect(parseIdList('2301.12345\n\n# later\n  2302.00001  \n')).toEqual(['2301.12345', '2302.00001']);
  });
});
