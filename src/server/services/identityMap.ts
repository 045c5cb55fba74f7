// =============================================================================
// Identity Map — Wrike company task id ↔ HubSpot company id
// =============================================================================
// Thin domain layer over the store's company_id_map. Every write is awaited
// and committed before the caller continues: a freshly created HubSpot
// company must never lose its link, or the next pass would create it again.
// =============================================================================
import type { CompanyMapping } from '../types';
import logger from '../utils/logger';
import type { SyncStore } from './syncStore';

export class IdentityMap {
  constructor(private readonly store: SyncStore) {}

  /** HubSpot id for a Wrike task; inactive links do not resolve. */
  async lookupHubSpotByWrike(wrikeCompanyId: string): Promise<string | null> {
    const mapping = await this.store.findMappingByWrikeId(wrikeCompanyId);
    if (!mapping || mapping.syncStatus !== 'active') return null;
    return mapping.hubspotCompanyId;
  }

  async lookupWrikeByHubSpot(hubspotCompanyId: string): Promise<string | null> {
    const mapping = await this.store.findMappingByHubSpotId(hubspotCompanyId);
    if (!mapping || mapping.syncStatus !== 'active') return null;
    return mapping.wrikeCompanyId;
  }

  /**
   * Links the pair, reactivating an inactive row. A different Wrike task
   * holding the same HubSpot id gives it up in the same step.
   */
  async link(
    wrikeCompanyId: string,
    hubspotCompanyId: string,
    companyName: string,
    notes = '',
  ): Promise<CompanyMapping> {
    const mapping = await this.store.upsertMapping({ wrikeCompanyId, hubspotCompanyId, companyName, notes });
    logger.debug('Identity map linked', { wrikeCompanyId, hubspotCompanyId });
    return mapping;
  }

  /** Soft-disables a link whose HubSpot record answered 404. Row is kept. */
  async markStale(wrikeCompanyId: string, reason: string): Promise<void> {
    await this.store.setMappingStatus(wrikeCompanyId, 'inactive', reason);
    logger.warn('Identity map entry marked stale', { wrikeCompanyId, reason });
  }
}
