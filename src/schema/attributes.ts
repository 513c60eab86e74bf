import { z } from 'zod';
import type { ControlKind } from '../types/index.js';

export const ATTRIBUTE_NAMES = [
  'first_name',
  'last_name',
  'full_name',
  'email',
  'phone',
  'address',
  'street',
  'city',
  'state',
  'zip',
  'country',
  'linkedin',
  'website',
  'university',
  'degree',
  'field_of_study',
  'graduation_year',
  'gpa',
  'visa_status',
  'requires_sponsorship',
  'salary_expectation',
  'start_date',
  'remote_work',
  'willing_to_relocate',
  'resume',
  'cover_letter',
  'transcript',
] as const;

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

export type AttributeType = 'text' | 'address' | 'boolean' | 'file';

const addressSchema = z
  .object({
    street: z.string().optional(),
    city: z.string().optional(),
    state: z.string().optional(),
    zip: z.string().optional(),
    country: z.string().optional(),
  })
  .strict();

export const personalRecordSchema = z
  .object({
    first_name: z.string(),
    last_name: z.string(),
    email: z.string(),
    phone: z.string(),
    address: addressSchema.default({}),
    linkedin: z.string().optional(),
    website: z.string().optional(),
    university: z.string().optional(),
    degree: z.string().optional(),
    field_of_study: z.string().optional(),
    graduation_year: z.string().optional(),
    gpa: z.string().optional(),
    visa_status: z.string().optional(),
    requires_sponsorship: z.boolean().optional(),
    salary_expectation: z.string().optional(),
    start_date: z.string().optional(),
    remote_work: z.boolean().optional(),
    willing_to_relocate: z.boolean().optional(),
    resume_path: z.string().optional(),
    cover_letter_path: z.string().optional(),
    transcript_path: z.string().optional(),
  })
  .strict();

export type PersonalRecord = Readonly<
  Omit<z.infer<typeof personalRecordSchema>, 'address'> & {
    address: Readonly<z.infer<typeof addressSchema>>;
  }
>;

export type AddressPart = keyof PersonalRecord['address'];

export const ADDRESS_PARTS: readonly AddressPart[] = ['street', 'city', 'state', 'zip', 'country'];

type ScalarKey = {
  [K in keyof PersonalRecord]-?: PersonalRecord[K] extends string | undefined ? K : never;
}[keyof PersonalRecord];

type BooleanKey = {
  [K in keyof PersonalRecord]-?: PersonalRecord[K] extends boolean | undefined ? K : never;
}[keyof PersonalRecord];

export type AttributeSource =
  | { from: 'scalar'; key: ScalarKey }
  | { from: 'boolean'; key: BooleanKey }
  | { from: 'address-part'; part: AddressPart }
  | { from: 'address' }
  | { from: 'full-name' }
  | { from: 'file'; key: 'resume_path' | 'cover_letter_path' | 'transcript_path' };

export interface AttributeSpec {
  type: AttributeType;
  source: AttributeSource;
  // Control kinds this attribute is expected to land in; others cost a confidence penalty
  controls: readonly ControlKind[];
  description: string;
}

const TEXT_CONTROLS: readonly ControlKind[] = ['text', 'textarea', 'select', 'radio'];
const BOOLEAN_CONTROLS: readonly ControlKind[] = ['checkbox', 'radio', 'select'];
const FILE_CONTROLS: readonly ControlKind[] = ['file'];

function text(key: ScalarKey, description: string): AttributeSpec {
  return { type: 'text', source: { from: 'scalar', key }, controls: TEXT_CONTROLS, description };
}

function addressPart(part: AddressPart, description: string): AttributeSpec {
  return { type: 'text', source: { from: 'address-part', part }, controls: TEXT_CONTROLS, description };
}

function flag(key: BooleanKey, description: string): AttributeSpec {
  return { type: 'boolean', source: { from: 'boolean', key }, controls: BOOLEAN_CONTROLS, description };
}

function file(
  key: 'resume_path' | 'cover_letter_path' | 'transcript_path',
  description: string
): AttributeSpec {
  return { type: 'file', source: { from: 'file', key }, controls: FILE_CONTROLS, description };
}

export const ATTRIBUTE_SCHEMA: Readonly<Record<AttributeName, AttributeSpec>> = {
  first_name: text('first_name', 'given name'),
  last_name: text('last_name', 'family name'),
  full_name: {
    type: 'text',
    source: { from: 'full-name' },
    controls: TEXT_CONTROLS,
    description: 'first and last name together',
  },
  email: text('email', 'email address'),
  phone: text('phone', 'phone number'),
  address: {
    type: 'address',
    source: { from: 'address' },
    controls: ['text', 'textarea'],
    description: 'complete postal address on one line',
  },
  street: addressPart('street', 'street address line'),
  city: addressPart('city', 'city or town'),
  state: addressPart('state', 'state, province or region'),
  zip: addressPart('zip', 'zip or postal code'),
  country: addressPart('country', 'country of residence'),
  linkedin: text('linkedin', 'LinkedIn profile URL'),
  website: text('website', 'personal website or portfolio URL'),
  university: text('university', 'university or school attended'),
  degree: text('degree', 'degree obtained'),
  field_of_study: text('field_of_study', 'major or field of study'),
  graduation_year: text('graduation_year', 'graduation year'),
  gpa: text('gpa', 'grade point average'),
  visa_status: text('visa_status', 'visa or work authorization status'),
  requires_sponsorship: flag('requires_sponsorship', 'whether visa sponsorship is required'),
  salary_expectation: text('salary_expectation', 'expected salary'),
  start_date: text('start_date', 'earliest start date'),
  remote_work: flag('remote_work', 'open to remote work'),
  willing_to_relocate: flag('willing_to_relocate', 'willing to relocate'),
  resume: file('resume_path', 'resume / CV file upload'),
  cover_letter: file('cover_letter_path', 'cover letter file upload'),
  transcript: file('transcript_path', 'academic transcript file upload'),
};

export function isAttributeName(value: string): value is AttributeName {
  return ATTRIBUTE_NAMES.some((name) => name === value);
}

export function expectsControl(attribute: AttributeName, kind: ControlKind): boolean {
  return ATTRIBUTE_SCHEMA[attribute].controls.includes(kind);
}
