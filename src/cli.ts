#!/usr/bin/env node

import { readFileSync, realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { createPipeline } from './ai/summary-generator.js';
import { type Config, apiKeyEnvName, loadConfig } from './config/index.js';
import { RunHistory } from './database/history.js';
import { type Command, parseArgs, parseIdList } from './lib/args.js';
import { errorMessage, looksLikeNetworkError } from './lib/errors.js';
import { configureLogging } from './lib/logger.js';

const RULE = '-'.repeat(50);

function printUsage(): void {
  console.log('Usage: paper-digest [--config PATH] <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  generate <paper_id>          Summarise one arXiv paper');
  console.log('    --download / --no-download   Download the PDF (default: on)');
  console.log('    -f, --force                  Download again even when cached');
  console.log('    --no-pdf-llm                 Skip the PDF summary');
  console.log('    -k, --api-key KEY            LLM API key');
  console.log('    --pptx                       Also write a slide deck');
  console.log('    --comment TEXT               Reviewer note, repeatable');
  console.log('  batch <input_file>           One paper ID per line');
  console.log('    -o, --output DIR             Where summaries go');
  console.log('    -k, --api-key KEY            LLM API key');
  console.log('  config-show                  Print the effective configuration');
  console.log('  history [--limit N]          Recent generation runs');
  console.log('');
  console.log('Example:');
  console.log('  paper-digest generate 2301.12345 --pptx --comment "Compare with our baseline"');
}

async function runGenerate(config: Config, command: Extract<Command, { name: 'generate' }>): Promise<void> {
  const { generator, browser } = createPipeline(config, { apiKey: command.apiKey });

  console.log(`Processing paper: ${command.paperId}`);
  try {
    const result = await generator.generate(command.paperId, {
      download: command.download,
      force: command.force,
      usePdfLlm: command.usePdfLlm,
      extraComments: command.comments,
      pptx: command.pptx,
    });

    console.log('\nGenerated summary:');
    console.log(RULE);
    console.log(result.summary);
    console.log(RULE);
    console.log(`Saved to: ${result.outputPath}`);
    if (result.slidesPath) {
      console.log(`Slides: ${result.slidesPath}`);
    }
  } finally {
    await browser.close();
  }
}

async function runBatch(config: Config, command: Extract<Command, { name: 'batch' }>): Promise<void> {
  const ids = parseIdList(readFileSync(command.inputFile, 'utf-8'));
  if (command.outputDir) {
    config.paths.summariesDir = command.outputDir;
  }

  const { generator, browser } = createPipeline(config, { apiKey: command.apiKey });
  console.log(`Processing ${ids.length} papers`);

  const failed: string[] = [];
  try {
    for (const paperId of ids) {
      console.log(`\n[${paperId}]`);
      try {
        const result = await generator.generate(paperId);
        console.log(`  ✓ ${result.outputPath}`);
      } catch (error) {
        console.error(`  ✗ ${errorMessage(error)}`);
        failed.push(paperId);
      }
    }
  } finally {
    await browser.close();
  }

  console.log(`\nDone: ${ids.length - failed.length} succeeded, ${failed.length} failed`);
  console.log(`Summaries saved to: ${resolve(config.paths.summariesDir)}`);
  if (failed.length > 0) {
    console.log(`Failed: ${failed.join(', ')}`);
  }
}

function showConfig(config: Config): void {
  const { text, vl } = config.api;

  console.log('Text generation:');
  console.log(`  Provider: ${text.provider}`);
  console.log(`  Model: ${text.model}`);
  console.log(`  Base URL: ${text.baseUrl}`);
  console.log(`  Key variable: ${apiKeyEnvName(text.provider)}`);
  console.log('\nPDF / vision analysis:');
  console.log(`  Provider: ${vl.provider}`);
  console.log(`  Model: ${vl.model}`);
  console.log(`  Key variable: ${apiKeyEnvName(vl.provider)}`);
  console.log(`\nAPI key: ${config.api.apiKey ? 'configured' : 'not configured'}`);
  console.log('\nSources:');
  console.log(`  arXiv order: ${config.arxiv.order}`);
  console.log(`  papers.cool order: ${config.papersCool.order}`);
  console.log(`  Browser: ${config.browser.enabled ? 'enabled' : 'disabled'}${config.browser.proxy ? ` (proxy ${config.browser.proxy})` : ''}`);
  console.log(`  Flex mode: ${config.flexMode.enabled ? 'on' : 'off'}`);
  console.log('\nDirectories:');
  console.log(`  Cache: ${config.paths.cacheDir}`);
  console.log(`  PDFs: ${config.paths.pdfDir}`);
  console.log(`  Summaries: ${config.paths.summariesDir}`);
  console.log(`  Slides: ${config.paths.slidesDir}`);
  console.log(`  Templates: ${config.paths.templatesDir}`);
  console.log(`\nSummary mode: ${config.summary.mode} (template ${config.summary.template})`);
}

async function showHistory(config: Config, limit: number): Promise<void> {
  const runs = await new RunHistory(config.paths.historyFile).recentRuns(limit);
  if (runs.length === 0) {
    console.log('No runs recorded yet.');
    return;
  }
  for (const run of runs) {
    const where = run.outputPath ?? run.errors[run.errors.length - 1] ?? '';
    console.log(`${run.startedAt}  ${run.paperId.padEnd(12)} ${run.mode.padEnd(12)} ${run.status.padEnd(10)} ${where}`);
  }
}

export async function main(argv: string[]): Promise<number> {
  try {
    const { configPath, command } = parseArgs(argv);
    if (command.name === 'help') {
      printUsage();
      return 0;
    }

    const config = loadConfig({ configPath });
    configureLogging(config.logging);

    switch (command.name) {
      case 'generate':
        await runGenerate(config, command);
        break;
      case 'batch':
        await runBatch(config, command);
        break;
      case 'config-show':
        showConfig(config);
        break;
      case 'history':
        await showHistory(config, command.limit);
        break;
    }
    return 0;
  } catch (error) {
    const message = errorMessage(error);
    console.error(`Error: ${message}`);
    if (looksLikeNetworkError(message)) {
      console.error('Hint: the network looks unstable. Retry, or pass --no-download to skip the PDF.');
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    console.error(`Cannot resolve entry point: ${errorMessage(error)}`);
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  }, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
