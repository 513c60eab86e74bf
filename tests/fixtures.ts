import { parsePersonalRecord } from '../src/services/record-store.js';
import type { PersonalRecord } from '../src/schema/attributes.js';

export function testRecord(overrides: Record<string, unknown> = {}): PersonalRecord {
  return parsePersonalRecord({
    first_name: 'Jane',
    last_name: 'Doe',
    email: 'jane@example.com',
    phone: '555-0100',
    address: { street: '1 Main St', city: 'Springfield', state: 'CA', country: 'United States' },
    requires_sponsorship: false,
    willing_to_relocate: true,
    resume_path: '/tmp/missing-resume.pdf',
    ...overrides,
  });
}
