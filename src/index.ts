#!/usr/bin/env node

import { Command } from 'commander';
import { getStoragePaths, loadEngineConfig, parsePort } from './config.js';
import { errorMessage } from './errors.js';
import { createSiteMapping, runScreenFill, runWebFill } from './fill-session.js';
import { createMatchServer } from './match-server.js';
import { FillEngine } from './services/fill-engine.js';
import { loadPersonalRecord, missingFiles, savePersonalRecord } from './services/record-store.js';
import { draftRecord, emptyRequiredAttributes, parseResume } from './services/resume-parser.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('form-autofill')
  .description('Match job application form fields to your personal data and fill them after review')
  .version('1.0.0');

program
  .command('setup')
  .description('Create the personal data file, optionally pre-filled from a PDF resume')
  .option('-r, --resume <pdf>', 'Resume to read contact details from')
  .option('-o, --out <path>', 'Where to write the personal data file')
  .option('--encrypt', 'Encrypt the file with PERSONAL_DATA_PASSPHRASE', false)
  .action(async (options: { resume?: string; out?: string; encrypt: boolean }) => {
    logger.banner();
    const storage = getStoragePaths();
    const out = options.out ?? storage.personalDataPath;

    if (options.encrypt && !storage.passphrase) {
      throw new Error('Set PERSONAL_DATA_PASSPHRASE to use --encrypt');
    }

    const resume = options.resume ? await parseResume(options.resume) : undefined;
    const record = draftRecord(resume, options.resume);
    savePersonalRecord(out, record, options.encrypt ? storage.passphrase : undefined);
    logger.success(`Personal data written to ${out}${options.encrypt ? ' (encrypted)' : ''}`);

    const empty = emptyRequiredAttributes(record);
    if (empty.length > 0) {
      logger.warn(`Fill in before your first run: ${empty.join(', ')}`);
    }
    for (const missing of missingFiles(record)) {
      logger.warn(`${missing.key} points to a missing file: ${missing.path}`);
    }
  });

program
  .command('check')
  .description('Validate the personal data file and the files it references')
  .action(() => {
    const storage = getStoragePaths();
    const record = loadPersonalRecord(storage.personalDataPath, storage.passphrase);
    logger.success(`${storage.personalDataPath} is valid`);

    for (const key of emptyRequiredAttributes(record)) {
      logger.warn(`${key} is empty`);
    }
    const missing = missingFiles(record);
    for (const file of missing) {
      logger.warn(`${file.key} points to a missing file: ${file.path}`);
    }
    if (missing.length === 0) {
      logger.success('All referenced files exist');
    }
  });

program
  .command('fill')
  .description('Preview and, after confirmation, fill the form at a URL (never submits)')
  .argument('<url>', 'Application form URL')
  .option('--headless', 'Run browser in headless mode', false)
  .option('--no-ai', 'Use rule matching only')
  .option('--preview <path>', 'Also save the preview as JSON')
  .action(async (url: string, options: { headless: boolean; ai: boolean; preview?: string }) => {
    logger.banner();
    const config = loadEngineConfig();
    if (!options.ai) config.anthropicApiKey = undefined;
    const storage = getStoragePaths();
    const record = loadPersonalRecord(storage.personalDataPath, storage.passphrase);

    await runWebFill({
      config,
      record,
      url,
      headless: options.headless,
      mappingsDir: storage.mappingsDir,
      previewPath: options.preview,
    });
  });

program
  .command('screen')
  .description('Match fields from an OCR screen layout and write the approved fill plan')
  .argument('<layout>', 'Screen layout JSON (control boxes and OCR text blocks)')
  .option('-o, --out <path>', 'Where to write the approved plan', 'artifacts/fill-plan.json')
  .option('--no-ai', 'Use rule matching only')
  .option('--preview <path>', 'Also save the preview as JSON')
  .action(async (layout: string, options: { out: string; ai: boolean; preview?: string }) => {
    logger.banner();
    const config = loadEngineConfig();
    if (!options.ai) config.anthropicApiKey = undefined;
    const storage = getStoragePaths();
    const record = loadPersonalRecord(storage.personalDataPath, storage.passphrase);

    await runScreenFill({
      config,
      record,
      layoutPath: layout,
      outPath: options.out,
      mappingsDir: storage.mappingsDir,
      previewPath: options.preview,
    });
  });

program
  .command('map')
  .description('Match the fields of a site once and save the result for later runs')
  .argument('<url>', 'Application form URL')
  .option('--headless', 'Run browser in headless mode', false)
  .action(async (url: string, options: { headless: boolean }) => {
    const storage = getStoragePaths();
    await createSiteMapping({ config: loadEngineConfig(), url, headless: options.headless, mappingsDir: storage.mappingsDir });
  });

program
  .command('serve')
  .description('Serve fill previews over HTTP on localhost')
  .option('-p, --port <number>', 'Port to listen on', process.env.PORT ?? '8787')
  .action((options: { port: string }) => {
    const port = parsePort(options.port);
    const storage = getStoragePaths();
    const record = loadPersonalRecord(storage.personalDataPath, storage.passphrase);
    const engine = new FillEngine(loadEngineConfig());

    createMatchServer({ engine, record }).listen(port, '127.0.0.1', () => {
      logger.success(`Match server listening on http://127.0.0.1:${port}`);
    });
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
