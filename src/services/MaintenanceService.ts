import type { Region } from '../types/index.js';
import { validateRegion } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

export interface MaintenanceRegistry {
  isUnderMaintenance(region: Region): boolean;
}

/**
 * Tracks regions whose upstream website is down for maintenance
 */
export class MaintenanceService implements MaintenanceRegistry {
  private regions = new Set<Region>();

  constructor(initialRegions: readonly string[] = []) {
    for (const candidate of initialRegions) {
      const result = validateRegion([candidate]);
      if (result.ok) {
        this.regions.add(result.value);
      } else {
        logger.warn('Ignoring unknown maintenance region', { region: candidate });
      }
    }
  }

  isUnderMaintenance(region: Region): boolean {
    return this.regions.has(region);
  }

  setMaintenance(region: Region, enabled: boolean): void {
    if (enabled) {
      this.regions.add(region);
    } else {
      this.regions.delete(region);
    }
    logger.info(`Maintenance ${enabled ? 'enabled' : 'disabled'} for ${region}`, { region });
  }

  listRegions(): Region[] {
    return Array.from(this.regions).sort();
  }

  static message(region: Region): string {
    return `${region.toUpperCase()} website is currently under maintenance.`;
  }
}
