const NAMED_ENTITIES = new Map<string, string>([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' '],
  ['ndash', '-'],
  ['mdash', '-'],
  ['hellip', '...'],
]);

function decodeEntities(input: string): string {
  return input.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return safeCodePoint(parseInt(body.slice(2), 16)) ?? entity;
    }
    if (body.startsWith('#')) {
      return safeCodePoint(parseInt(body.slice(1), 10)) ?? entity;
    }
    return NAMED_ENTITIES.get(body.toLowerCase()) ?? ' ';
  });
}

function safeCodePoint(code: number): string | undefined {
  if (!Number.isFinite(code) || code < 0 || code > 0x10ffff) return undefined;
  return String.fromCodePoint(code);
}

/**
 * Turns a raw label (HTML label text, placeholder, `name` attribute or OCR output)
 * into lowercase words separated by single spaces. Total and idempotent.
 */
export function normalizeLabel(raw: string): string {
  if (!raw || raw.trim().length === 0) return '';

  return (
    decodeEntities(raw.replace(/<[^>]*>/g, ' '))
      .replace(/[\u200B-\u200D\uFEFF]/g, '')
      // firstName -> first Name, before lowercasing loses the boundary
      .replace(/([a-z])([A-Z])/g, '$1 $2')
      .toLowerCase()
      // underscores and punctuation both separate words
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
      .trim()
  );
}
