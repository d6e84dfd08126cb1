import type { FeatureProperties } from '../types';

/**
 * Upstream layers spell the same attribute several ways. Each logical field
 * lists the keys to try, in priority order.
 */
export const PROPERTY_ALIASES = {
  zoneCode: ['sigla', 'SIGLA', 'zona_sigla', 'ZONA_SIGLA', 'name'],
  zoneName: ['zona', 'ZONA', 'nome', 'NOME'],
  streetName: ['log_ofic', 'LOG_OFIC', 'name', 'NOME'],
  streetClass: ['hierarquia', 'HIERARQUIA'],
} as const satisfies Record<string, readonly string[]>;

export type AliasedField = keyof typeof PROPERTY_ALIASES;

/** Keys every zoning feature carries after normalization. */
export const ZONE_NORMALIZED_KEYS = ['sigla', 'zona', 'zona_sigla', 'nome', 'NOME', 'SIGLA', 'name'] as const;

/**
 * First non-empty value among the field's aliases, as a string; '' if none.
 */
export function readAliased(props: FeatureProperties | null | undefined, field: AliasedField): string {
  if (!props) return '';
  for (const key of PROPERTY_ALIASES[field]) {
    const value = props[key];
    if (value !== undefined && value !== null && value !== '') {
      return String(value);
    }
  }
  return '';
}

/**
 * Copy of the properties with every normalized zone key present.
 */
export function normalizeZoneProperties(props: FeatureProperties): FeatureProperties {
  const normalized: FeatureProperties = { ...props };
  for (const key of ZONE_NORMALIZED_KEYS) {
    if (normalized[key] === undefined || normalized[key] === null) {
      normalized[key] = '';
    }
  }
  return normalized;
}
