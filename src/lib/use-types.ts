/**
 * Use-type codes come from the rules database and are not perfectly
 * consistent (RES_UNI, res_unifamiliar, RESUNI...). These helpers classify
 * them by pattern instead of by exact code.
 */

const normalize = (value: string | null | undefined): string => (value ?? '').trim();

export function isSingleFamilyUse(code: string, label = ''): boolean {
  const c = normalize(code).toUpperCase();
  const l = normalize(label).toLowerCase();
  if (c.startsWith('RES_UNI') || ['RESUNI', 'RES_UNIF'].includes(c)) return true;
  if (c.startsWith('RES') && c.includes('UNI')) return true;
  return l.includes('unifamiliar') || l.includes('single-family');
}

export function isMultiFamilyUse(code: string, label = ''): boolean {
  const c = normalize(code).toUpperCase();
  const l = normalize(label).toLowerCase();
  if (c.startsWith('RES_MULTI') || ['RESMULTI', 'RES_MF'].includes(c)) return true;
  if (c.startsWith('RES') && (c.includes('MULTI') || c.endsWith('_MF'))) return true;
  return l.includes('multifamiliar') || l.includes('multi-family');
}

export function isResidentialUse(code: string, label = ''): boolean {
  return (
    isSingleFamilyUse(code, label) ||
    isMultiFamilyUse(code, label) ||
    normalize(code).toUpperCase().includes('RESIDEN')
  );
}
