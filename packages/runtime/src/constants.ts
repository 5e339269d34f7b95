// Split-window constants

/** Lowest valid brightness-temperature digital number. */
export const DN_MIN = 1;

/**
 * Highest valid brightness-temperature digital number. TIRS data is packed
 * in 16 bits though quantised to 12.
 */
export const DN_MAX = 65535;

/** Default placeholder for band 10 in the rendered raster formula. */
export const MAPCALC_PLACEHOLDER_T10 = 'Input_T10';

/** Default placeholder for band 11 in the rendered raster formula. */
export const MAPCALC_PLACEHOLDER_T11 = 'Input_T11';

/** Source of the algorithm and its coefficient tables. */
export const CITATION =
  'Du, Chen; Ren, Huazhong; Qin, Qiming; Meng, Jinjie; Zhao, Shaohua. 2015. ' +
  '"A Practical Split-Window Algorithm for Estimating Land Surface Temperature ' +
  'from Landsat 8 Data." Remote Sens. 7, no. 1: 647-665.';
