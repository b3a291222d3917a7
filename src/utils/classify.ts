import type { FinalType, UnclassifiedRecord } from '../types/metabolite.js';

// Lower-case substrings of HMDB super_class, checked in this order
export const PRIMARY_KEYWORDS = ['lipid', 'organic acid', 'nucleoside'] as const;
export const SECONDARY_KEYWORDS = ['flavonoid', 'alkaloid', 'terpene'] as const;

/**
 * Final primary/secondary call for a merged row.
 *
 * An explicit KEGG type always wins. Otherwise the HMDB super_class is
 * matched against the keyword lists, primary first.
 */
export function classifyMetabolite(
  record: Pick<UnclassifiedRecord, 'type' | 'super_class'>
): FinalType {
  if (record.type) {
    return record.type;
  }

  const superClass = (record.super_class ?? '').toLowerCase();

  if (PRIMARY_KEYWORDS.some((keyword) => superClass.includes(keyword))) {
    return 'primary';
  }
  if (SECONDARY_KEYWORDS.some((keyword) => superClass.includes(keyword))) {
    return 'secondary';
  }
  return 'unknown';
}
