import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ATTRIBUTE_NAMES, type AttributeName } from '../schema/attributes.js';
import type { MatchResult } from '../types/index.js';
import { logger } from '../utils/logger.js';

const siteMappingSchema = z.object({
  host: z.string().min(1),
  createdAt: z.string(),
  fields: z.record(z.string(), z.enum(ATTRIBUTE_NAMES)),
});

export type SiteMapping = z.infer<typeof siteMappingSchema>;

export function hostOf(url: string): string {
  return new URL(url).hostname.toLowerCase();
}

function mappingFile(dir: string, url: string): string {
  // Hostnames only hold [a-z0-9.-], safe as a file name
  return path.resolve(dir, `${hostOf(url)}.json`);
}

/**
 * Keeps the confident matches of a run as a reusable field id -> attribute map.
 */
export function mappingFromMatches(url: string, matches: readonly MatchResult[]): SiteMapping {
  const fields: Record<string, AttributeName> = {};
  for (const match of matches) {
    if (match.attribute !== 'unmatched') {
      fields[match.fieldId] = match.attribute;
    }
  }
  return { host: hostOf(url), createdAt: new Date().toISOString(), fields };
}

export function saveSiteMapping(dir: string, url: string, mapping: SiteMapping): string {
  const file = mappingFile(dir, url);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(mapping, null, 2) + '\n');
  return file;
}

export function loadSiteMapping(dir: string, url: string): SiteMapping | undefined {
  const file = mappingFile(dir, url);
  if (!fs.existsSync(file)) return undefined;

  const parsed = siteMappingSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid site mapping ${file}: ${issues}`);
  }

  logger.info(`Using saved mapping for ${parsed.data.host} (${Object.keys(parsed.data.fields).length} fields)`);
  return parsed.data;
}
