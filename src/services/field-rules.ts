import type { AttributeName } from '../schema/attributes.js';

export interface FieldRule {
  attribute: AttributeName;
  pattern: RegExp;
  baseConfidence: number;
  // Rule is skipped when this also matches the label
  unless?: RegExp;
}

/**
 * Matching rules over normalized labels, evaluated top to bottom. The first
 * rule whose pattern matches wins, so every specific rule has to sit above the
 * generic one that would also match it ("first name" above "name",
 * "email address" above "address", "field of study" above "degree").
 */
export const FIELD_RULES: readonly FieldRule[] = [
  // Names
  { attribute: 'first_name', pattern: /\b(first|given) ?name\b|\bfname\b|\bforenames?\b/, baseConfidence: 0.9 },
  { attribute: 'last_name', pattern: /\b(last|family) ?name\b|\blname\b|\bsurname\b/, baseConfidence: 0.9 },
  {
    attribute: 'full_name',
    pattern: /\b(full|complete|legal) name\b|\b(applicant|candidate|your) name\b/,
    baseConfidence: 0.85,
  },

  // Contact
  { attribute: 'email', pattern: /\be ?mail\b/, baseConfidence: 0.95 },
  {
    attribute: 'phone',
    pattern: /\b(phone|telephone|mobile|cell|tel)\b|\bcontact number\b/,
    baseConfidence: 0.9,
  },
  { attribute: 'linkedin', pattern: /\blinked ?in\b/, baseConfidence: 0.95 },
  { attribute: 'website', pattern: /\b(website|portfolio|homepage|personal site|github)\b/, baseConfidence: 0.85 },

  // Documents
  { attribute: 'cover_letter', pattern: /\bcover(ing)? letter\b|\bmotivation letter\b/, baseConfidence: 0.9 },
  { attribute: 'resume', pattern: /\br[eé]sum[eé](?= |$)|\bcv\b|\bcurriculum vitae\b/, baseConfidence: 0.85 },
  { attribute: 'transcript', pattern: /\btranscripts?\b|\bacademic record\b/, baseConfidence: 0.85 },

  // Address parts before the whole address
  { attribute: 'street', pattern: /\bstreet\b|\baddress (line )?1\b/, baseConfidence: 0.85 },
  { attribute: 'city', pattern: /\b(city|town|locality)\b/, baseConfidence: 0.9 },
  { attribute: 'zip', pattern: /\b(zip|postcode)\b|\bpostal code\b/, baseConfidence: 0.9 },
  { attribute: 'state', pattern: /\b(state|province|region|county)\b/, baseConfidence: 0.8 },
  { attribute: 'country', pattern: /\bcountry\b/, baseConfidence: 0.85 },
  {
    attribute: 'address',
    pattern: /\baddress\b/,
    baseConfidence: 0.7,
    unless: /\baddress line [2-9]\b|\bline [2-9]\b|\b(apt|apartment|suite|unit)\b/,
  },

  // Education
  { attribute: 'field_of_study', pattern: /\bfield of study\b|\b(major|discipline)\b/, baseConfidence: 0.85 },
  { attribute: 'degree', pattern: /\b(degree|qualification)\b|\beducation level\b/, baseConfidence: 0.8 },
  {
    attribute: 'graduation_year',
    pattern: /\bgraduation\b|\bgrad(uate)? year\b|\bcompletion year\b/,
    baseConfidence: 0.85,
  },
  { attribute: 'gpa', pattern: /\bgpa\b|\bgrade point\b/, baseConfidence: 0.9 },
  {
    attribute: 'university',
    pattern: /\b(university|college|school|institution)\b|\balma mater\b/,
    baseConfidence: 0.8,
  },

  // Work authorization and preferences
  { attribute: 'requires_sponsorship', pattern: /\bsponsor(ship)?\b/, baseConfidence: 0.85 },
  {
    attribute: 'visa_status',
    pattern: /\bvisa\b|\bwork authori[sz]ation\b|\bright to work\b|\bwork permit\b/,
    baseConfidence: 0.75,
  },
  { attribute: 'salary_expectation', pattern: /\b(salary|compensation|wage)\b|\bdesired pay\b/, baseConfidence: 0.8 },
  {
    attribute: 'start_date',
    pattern: /\bstart date\b|\bavailable to start\b|\bearliest start\b|\bavailability date\b/,
    baseConfidence: 0.8,
  },
  { attribute: 'willing_to_relocate', pattern: /\brelocat(e|ion)\b/, baseConfidence: 0.8 },
  { attribute: 'remote_work', pattern: /\bremote\b/, baseConfidence: 0.7 },

  // Generic fallbacks
  {
    attribute: 'full_name',
    pattern: /\bname\b/,
    baseConfidence: 0.6,
    unless:
      /\b(company|employer|organi[sz]ation|school|university|user|reference|manager|file|job|position|middle|maiden|nick|preferred|emergency|contact|father|mother|parent|spouse|recruiter|referr\w*)\b/,
  },
  { attribute: 'website', pattern: /\b(url|link)\b/, baseConfidence: 0.6 },
];
