import fs from 'fs';
import { createRequire } from 'module';
import path from 'path';
import type PdfParse from 'pdf-parse';
import { parsePersonalRecord } from './record-store.js';
import type { PersonalRecord } from '../schema/attributes.js';
import { logger } from '../utils/logger.js';

// The package entry runs a self-test when loaded as an ES module
const require = createRequire(import.meta.url);
const pdf: typeof PdfParse = require('pdf-parse/lib/pdf-parse.js');

export interface ResumeData {
  rawText: string;
  name?: string;
  email?: string;
  phone?: string;
  linkedin?: string;
  website?: string;
}

export async function parseResume(resumePath: string): Promise<ResumeData> {
  logger.action(`Parsing resume: ${resumePath}`);

  const absolutePath = path.resolve(resumePath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Resume file not found: ${absolutePath}`);
  }

  const pdfData = await pdf(fs.readFileSync(absolutePath));
  const data = extractResumeData(pdfData.text);

  logger.success(`Resume parsed: ${pdfData.numpages} pages, ${data.rawText.length} characters`);
  if (data.name) logger.info(`  Name: ${data.name}`);
  if (data.email) logger.info(`  Email: ${data.email}`);
  if (data.phone) logger.info(`  Phone: ${data.phone}`);

  return data;
}

export function extractResumeData(rawText: string): ResumeData {
  return {
    rawText,
    name: extractName(rawText),
    email: extractEmail(rawText),
    phone: extractPhone(rawText),
    linkedin: extractLinkedin(rawText),
    website: extractWebsite(rawText),
  };
}

function extractEmail(text: string): string | undefined {
  const match = text.match(/[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}/i);
  return match ? match[0] : undefined;
}

function extractPhone(text: string): string | undefined {
  const match = text.match(/(?:\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/);
  return match ? match[0].trim() : undefined;
}

function extractLinkedin(text: string): string | undefined {
  const match = text.match(/(?:https?:\/\/)?(?:www\.)?linkedin\.com\/in\/[\w-]+\/?/i);
  return match ? match[0] : undefined;
}

function extractWebsite(text: string): string | undefined {
  const urls = text.match(/https?:\/\/[^\s,;]+/gi) ?? [];
  return urls.find((url) => !/linkedin\.com/i.test(url));
}

function extractName(text: string): string | undefined {
  // First non-empty line, if it reads like a name
  const firstLine = text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (firstLine && /^[\p{L}][\p{L}' .-]{1,49}$/u.test(firstLine) && firstLine.split(/\s+/).length <= 4) {
    return firstLine;
  }
  return undefined;
}

function splitName(name: string | undefined): { first: string; last: string } {
  if (!name) return { first: '', last: '' };
  const parts = name.split(/\s+/);
  if (parts.length === 1) return { first: parts[0], last: '' };
  return { first: parts[0], last: parts.slice(1).join(' ') };
}

/**
 * Starting record for setup. Required attributes the resume did not reveal
 * stay empty for the user to fill in.
 */
export function draftRecord(resume?: ResumeData, resumePath?: string): PersonalRecord {
  const { first, last } = splitName(resume?.name);
  return parsePersonalRecord(
    {
      first_name: first,
      last_name: last,
      email: resume?.email ?? '',
      phone: resume?.phone ?? '',
      address: {},
      ...(resume?.linkedin ? { linkedin: resume.linkedin } : {}),
      ...(resume?.website ? { website: resume.website } : {}),
      ...(resumePath ? { resume_path: path.resolve(resumePath) } : {}),
    },
    'setup draft'
  );
}

export function emptyRequiredAttributes(record: PersonalRecord): string[] {
  const required = ['first_name', 'last_name', 'email', 'phone'] as const;
  return required.filter((key) => record[key].trim() === '');
}
