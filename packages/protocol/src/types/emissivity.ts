// Land surface emissivity types

/**
 * Land cover class label, e.g. "Cropland"
 */
export type LandCoverClass = string;

/**
 * Average emissivities of TIRS band 10 (~10.9 μm) and band 11 (~12.0 μm).
 * Each lies in (0, 1].
 */
export type EmissivityPair = {
  b10: number;
  b11: number;
};

export type EmissivityEntry = EmissivityPair & {
  landCover: LandCoverClass;
};

export type EmissivityTable = readonly EmissivityEntry[];
