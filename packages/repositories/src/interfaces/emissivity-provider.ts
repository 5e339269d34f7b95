import type { EmissivityPair, LandCoverClass } from '@thermalwin/protocol';

/**
 * Provider of band 10 / band 11 emissivities per land cover class.
 */
export interface EmissivityProvider {
  /**
   * Look up the emissivity pair for a land cover class
   * @returns EmissivityPair or null if the class is unknown
   */
  getEmissivities(landCover: LandCoverClass): EmissivityPair | null;

  /**
   * All known land cover classes, in source order
   */
  listLandCoverClasses(): LandCoverClass[];
}
