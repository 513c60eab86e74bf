import fs from 'fs';
import path from 'path';
import { createInterface } from 'readline/promises';
import type { EngineConfig } from './config.js';
import { DetectionFailure } from './errors.js';
import type { PersonalRecord } from './schema/attributes.js';
import { closeBrowser, launchBrowser, navigateTo } from './services/browser.js';
import { FillEngine } from './services/fill-engine.js';
import { ApprovedFill, writePreviewJson } from './services/fill-preview.js';
import { detectWebFields } from './services/form-detector.js';
import { injectApprovedFill } from './services/form-injector.js';
import { detectScreenFields, screenLayoutSchema } from './services/screen-layout.js';
import { loadSiteMapping, mappingFromMatches, saveSiteMapping } from './services/site-mappings.js';
import type { FillPreview, FillStats, FormField, MatchResult } from './types/index.js';
import { logger } from './utils/logger.js';

export type Confirm = (question: string) => Promise<boolean>;

export interface SessionOptions {
  config: EngineConfig;
  record: PersonalRecord;
  mappingsDir: string;
  engine?: FillEngine;
  confirm?: Confirm;
  // Also write the preview as JSON here
  previewPath?: string;
}

export interface WebFillOptions extends SessionOptions {
  url: string;
  headless: boolean;
}

async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export const terminalConfirm: Confirm = async (question) => {
  const answer = await ask(`${question} [y/N] `);
  return /^y(es)?$/i.test(answer.trim());
};

/**
 * Shows the preview and asks for approval. Returns null when there is
 * nothing to fill or the user declines.
 */
async function approve(
  preview: FillPreview,
  stats: FillStats,
  options: Pick<SessionOptions, 'confirm' | 'previewPath'>
): Promise<ApprovedFill | null> {
  logger.preview(preview.entries);
  logger.summary(stats);
  if (options.previewPath) {
    logger.info(`Preview saved to ${writePreviewJson(preview, options.previewPath)}`);
  }

  if (stats.ready === 0) {
    logger.warn('No field has a value to fill');
    return null;
  }

  const confirm = options.confirm ?? terminalConfirm;
  if (!(await confirm(`Fill ${stats.ready} field(s) as shown?`))) {
    logger.info('Nothing was written');
    return null;
  }
  return ApprovedFill.fromPreview(preview);
}

/**
 * Detect, match, preview, and on approval fill a web form. The page stays
 * open until the user has reviewed it; nothing is ever submitted.
 */
export async function runWebFill(options: WebFillOptions): Promise<FillStats | null> {
  const engine = options.engine ?? new FillEngine(options.config);
  logger.info(`AI matcher: ${engine.aiEnabled ? options.config.aiModel : 'disabled'}`);

  try {
    logger.divider('Step 1: Browser Setup');
    const page = await launchBrowser({ headless: options.headless, slowMo: 0 });
    await navigateTo(options.url);

    logger.divider('Step 2: Detecting Fields');
    let fields: FormField[];
    try {
      fields = await detectWebFields(page);
    } catch (error) {
      if (error instanceof DetectionFailure) {
        logger.warn(`Nothing to fill: ${error.message}`);
        return null;
      }
      throw error;
    }

    logger.divider('Step 3: Matching');
    const mapping = loadSiteMapping(options.mappingsDir, options.url);
    const { preview, stats } = await engine.buildPreview(fields, options.record, { siteMapping: mapping?.fields });

    const approved = await approve(preview, stats, options);
    if (!approved) return stats;

    await injectApprovedFill(page, approved);
    if (!options.headless) {
      await ask('Review the form in the browser, then press Enter to close it...');
    }
    return stats;
  } finally {
    await closeBrowser();
  }
}

export interface ScreenFillOptions extends SessionOptions {
  layoutPath: string;
  outPath: string;
}

/**
 * Screen forms are filled by an external pointer driver; this writes the
 * approved plan for it to replay.
 */
export async function runScreenFill(options: ScreenFillOptions): Promise<FillStats | null> {
  const engine = options.engine ?? new FillEngine(options.config);

  const layoutFile = path.resolve(options.layoutPath);
  const layout = screenLayoutSchema.parse(JSON.parse(fs.readFileSync(layoutFile, 'utf8')));
  const fields = detectScreenFields(layout);
  if (fields.length === 0) {
    logger.warn(`Nothing to fill: ${new DetectionFailure(layoutFile).message}`);
    return null;
  }
  logger.success(`Found ${fields.length} fields in ${layoutFile}`);

  const { preview, stats } = await engine.buildPreview(fields, options.record);
  const approved = await approve(preview, stats, options);
  if (!approved) return stats;

  const outFile = path.resolve(options.outPath);
  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(
    outFile,
    JSON.stringify({ approvedAt: approved.approvedAt.toISOString(), items: approved.items() }, null, 2) + '\n'
  );
  logger.success(`Wrote ${approved.size} approved values to ${outFile}`);
  return stats;
}

export interface MappingOptions {
  config: EngineConfig;
  url: string;
  mappingsDir: string;
  headless: boolean;
  engine?: FillEngine;
}

/**
 * Matches a page once and saves the accepted matches for later runs on the
 * same host.
 */
export async function createSiteMapping(options: MappingOptions): Promise<string> {
  const engine = options.engine ?? new FillEngine(options.config);

  try {
    const page = await launchBrowser({ headless: options.headless, slowMo: 0 });
    await navigateTo(options.url);
    const fields = await detectWebFields(page);

    const matches: MatchResult[] = [];
    for (const field of fields) {
      const { result } = await engine.matchField(field);
      logger.match(field.label, result.attribute, result.confidence, result.source);
      matches.push(result);
    }

    const mapping = mappingFromMatches(options.url, matches);
    const file = saveSiteMapping(options.mappingsDir, options.url, mapping);
    logger.success(`Saved ${Object.keys(mapping.fields).length} field mappings to ${file}`);
    return file;
  } finally {
    await closeBrowser();
  }
}
