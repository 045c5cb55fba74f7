// =============================================================================
// Field Mapping Table
// =============================================================================
// Translates each domain field between Wrike custom-field ids and HubSpot
// property names, and owns the value tables (tier ↔ priority) plus the
// company marker-prefix convention.
//
// Contact job title exists only in HubSpot and is deliberately absent from
// both contact tables below.
// =============================================================================
import type { SyncConfig } from '../config';
import type { WrikeCustomFieldValue, WrikeTask } from '../types';

/** Trimmed string form of any remote value; null/undefined become '' */
export function normalizeValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/** Reads one custom field off a Wrike task, or null when unset. */
export function readCustomField(task: WrikeTask, fieldId: string): string | null {
  const entry = (task.customFields ?? []).find((cf) => cf.id === fieldId);
  const value = normalizeValue(entry?.value);
  return value === '' ? null : value;
}

/**
 * Returns a new custom-field list with `fieldId` set to `value`.
 * Empty values remove the entry so Wrike keeps its current value.
 */
export function setCustomField(
  fields: WrikeCustomFieldValue[],
  fieldId: string,
  value: string | null | undefined,
): WrikeCustomFieldValue[] {
  const out = fields.filter((cf) => cf.id !== fieldId).map((cf) => ({ ...cf }));
  const text = normalizeValue(value);
  if (text !== '') out.push({ id: fieldId, value: text });
  return out;
}

/** `first last`, tolerating either half missing */
export function fullName(first: string | null | undefined, last: string | null | undefined): string {
  return [normalizeValue(first), normalizeValue(last)].filter(Boolean).join(' ');
}

/** Splits a contact task title on its first space. */
export function splitTitle(title: string): { first: string; last: string } {
  const trimmed = title.trim();
  const idx = trimmed.indexOf(' ');
  if (idx === -1) return { first: trimmed, last: '' };
  return { first: trimmed.slice(0, idx), last: trimmed.slice(idx + 1).trim() };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Domain field → (Wrike field, HubSpot property) pair for contacts */
export interface ContactFieldPair {
  label: string;
  wrikeField: string;
  hubspotProperty: string;
}

export class FieldMappingTable {
  private readonly tierMap: Map<string, string>;
  private readonly priorityMap: Map<string, string>;
  private readonly markerRe: RegExp;

  constructor(private readonly cfg: SyncConfig) {
    this.tierMap = new Map(Object.entries(cfg.sync.tierToPriority));
    this.priorityMap = cfg.sync.priorityToTier
      ? new Map(Object.entries(cfg.sync.priorityToTier))
      : new Map([...this.tierMap].map(([tier, priority]) => [priority, tier]));
    this.markerRe = new RegExp(`^${escapeRegExp(cfg.sync.markerPrefix)}[_\\s-]*`);
  }

  get marker(): string {
    return this.cfg.sync.markerPrefix;
  }

  get company() {
    return {
      wrike: this.cfg.wrike.companyCustomFields,
      hubspot: this.cfg.hubspot.companyProperties,
    };
  }

  get contact() {
    return {
      wrike: this.cfg.wrike.contactCustomFields,
      hubspot: this.cfg.hubspot.contactProperties,
    };
  }

  // ── Value tables ─────────────────────────────────────────────────────────

  /** Unmapped values pass through unchanged. */
  tierToPriority(tier: string | null | undefined): string {
    const key = normalizeValue(tier);
    if (!key) return '';
    return this.tierMap.get(key) ?? key;
  }

  priorityToTier(priority: string | null | undefined): string {
    const key = normalizeValue(priority);
    if (!key) return '';
    return this.priorityMap.get(key) ?? key;
  }

  /** Configured tiers whose priority does not map back to them */
  nonInvertibleTiers(): string[] {
    return [...this.tierMap.keys()].filter((tier) => this.priorityToTier(this.tierToPriority(tier)) !== tier);
  }

  // ── Marker convention ───────────────────────────────────────────────────

  hasMarkerPrefix(title: string | null | undefined): boolean {
    return normalizeValue(title).startsWith(this.marker);
  }

  /**
   * Display name for HubSpot: strips `Marker_`, `Marker `, `Marker-` (or a
   * bare marker) until none remains at the front.
   */
  cleanCompanyName(title: string | null | undefined): string {
    let name = normalizeValue(title);
    while (name.startsWith(this.marker)) {
      name = name.replace(this.markerRe, '').trim();
    }
    return name;
  }

  // ── Property lists ──────────────────────────────────────────────────────

  companyPropertyNames(): string[] {
    const p = this.cfg.hubspot.companyProperties;
    return [p.name, p.accountStatus, p.affinityScore, p.accountPriority, p.wrikeTaskId, p.lastModified];
  }

  contactPropertyNames(): string[] {
    const p = this.cfg.hubspot.contactProperties;
    return [p.firstname, p.lastname, p.email, p.phone, p.mobilephone, p.address, p.address2, p.city, p.state, p.country];
  }

  /** Contact attributes other than the name pair and email. */
  contactAttributePairs(): ContactFieldPair[] {
    const w = this.cfg.wrike.contactCustomFields;
    const h = this.cfg.hubspot.contactProperties;
    return [
      { label: 'Phone', wrikeField: w.phone, hubspotProperty: h.phone },
      { label: 'Mobile', wrikeField: w.mobile, hubspotProperty: h.mobilephone },
      { label: 'Address', wrikeField: w.address1, hubspotProperty: h.address },
      { label: 'Address 2', wrikeField: w.address2, hubspotProperty: h.address2 },
      { label: 'City', wrikeField: w.city, hubspotProperty: h.city },
      { label: 'State', wrikeField: w.state, hubspotProperty: h.state },
      { label: 'Country', wrikeField: w.country, hubspotProperty: h.country },
    ];
  }
}
