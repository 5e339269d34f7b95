// Tests for the split-window estimator

import { describe, it, expect, beforeAll, vi } from 'vitest';
import type { CwvSubrange } from '@thermalwin/protocol';
import {
  createInMemoryCoefficientProvider,
  createInMemoryEmissivityProvider,
  loadDefaultProviders,
  type CoefficientProvider,
  type LoadedProviders,
} from '@thermalwin/repositories';
import {
  SplitWindowEstimator,
  createSplitWindowEstimator,
  createEstimatorForLandCover,
  type SplitWindowInput,
} from './estimator.js';
import { EQUATION } from './render.js';
import {
  AmbiguousSubrangeError,
  InvalidEmissivityError,
  NoMatchingSubrangeError,
  OutOfRangeInputError,
  UnknownLandCoverError,
  ValidationError,
} from '../errors.js';
import { createCapturingLogger } from '../logger.js';
import { CITATION } from '../constants.js';

// --- Test Fixtures ---

function createSubrange(overrides: Partial<CwvSubrange>): CwvSubrange {
  return {
    key: 'Range',
    low: 0.0,
    high: 6.3,
    b0: 1,
    b1: 2,
    b2: 3,
    b3: 4,
    b4: 5,
    b5: 6,
    b6: 7,
    b7: 8,
    rmse: 0.5,
    ...overrides,
  };
}

function createProvider(subranges: CwvSubrange[]): CoefficientProvider {
  return createInMemoryCoefficientProvider(subranges);
}

const synthetic = createProvider([
  createSubrange({ key: 'Dry', low: 0.0, high: 2.0, rmse: 0.25 }),
  createSubrange({ key: 'Humid', low: 2.0, high: 6.3, b0: -1, b1: 4, rmse: 0.75 }),
]);

const overlapping = createProvider([
  createSubrange({ key: 'Narrow', low: 0.0, high: 2.5 }),
  createSubrange({ key: 'Wide', low: 0.0, high: 6.3, b0: 10 }),
]);

const scene = { emissivityB10: 0.97, emissivityB11: 0.98, columnWaterVapour: 1.5 };

// --- Tests ---

describe('SplitWindowEstimator', () => {
  describe('construction', () => {
    it('derives the emissivity terms once', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.emissivityT10).toBe(0.97);
      expect(estimator.emissivityT11).toBe(0.98);
      expect(estimator.averageEmissivity).toBe(0.975);
      expect(estimator.deltaEmissivity).toBe(0.97 - 0.98);
      expect(estimator.columnWaterVapour).toBe(1.5);
    });

    it('resolves the subrange, coefficients and RMSE', () => {
      const estimator = new SplitWindowEstimator(
        { ...scene, columnWaterVapour: 3.1 },
        { coefficients: synthetic }
      );

      expect(estimator.subrange.key).toBe('Humid');
      expect(estimator.coefficients).toEqual({ b0: -1, b1: 4, b2: 3, b3: 4, b4: 5, b5: 6, b6: 7, b7: 8 });
      expect(estimator.rmse).toBe(0.75);
      expect(estimator.getCoefficients()).toEqual([-1, 4, 3, 4, 5, 6, 7, 8]);
    });

    it('raises NoMatchingSubrangeError when no subrange contains the CWV', () => {
      expect(
        () => new SplitWindowEstimator({ ...scene, columnWaterVapour: 7.0 }, { coefficients: synthetic })
      ).toThrow(NoMatchingSubrangeError);
      expect(
        () => new SplitWindowEstimator({ ...scene, columnWaterVapour: 2.0 }, { coefficients: synthetic })
      ).toThrow(NoMatchingSubrangeError);
    });

    it('passes the tie-break policy through', () => {
      expect(
        () => new SplitWindowEstimator(scene, { coefficients: overlapping, tieBreak: 'strict' })
      ).toThrow(AmbiguousSubrangeError);
      expect(
        new SplitWindowEstimator(scene, { coefficients: overlapping, tieBreak: 'first' }).subrange.key
      ).toBe('Narrow');
      expect(
        new SplitWindowEstimator(scene, { coefficients: overlapping, random: () => 0.5 }).subrange.key
      ).toBe('Wide');
    });

    it('draws from the injected generator once, at construction', () => {
      const random = vi.fn(() => 0.1);
      const estimator = new SplitWindowEstimator(scene, { coefficients: overlapping, random });

      estimator.computeLst(300, 295);
      estimator.computeLst(301, 296);

      expect(random).toHaveBeenCalledOnce();
      expect(estimator.subrange.key).toBe('Narrow');
    });

    const invalidEmissivities: Array<[field: string, override: Partial<SplitWindowInput>]> = [
      ['emissivityB10', { emissivityB10: 0 }],
      ['emissivityB10', { emissivityB10: -0.5 }],
      ['emissivityB11', { emissivityB11: 1.2 }],
      ['emissivityB11', { emissivityB11: Number.NaN }],
    ];

    it.each(invalidEmissivities)('rejects an invalid %s', (field, override) => {
      try {
        new SplitWindowEstimator({ ...scene, ...override }, { coefficients: synthetic });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidEmissivityError);
        if (error instanceof InvalidEmissivityError) {
          expect(error.field).toBe(field);
        }
      }
    });

    it('accepts an emissivity of exactly one', () => {
      expect(
        () => new SplitWindowEstimator({ ...scene, emissivityB10: 1 }, { coefficients: synthetic })
      ).not.toThrow();
    });

    it('rejects a non-finite CWV before resolving', () => {
      try {
        new SplitWindowEstimator({ ...scene, columnWaterVapour: Number.NaN }, { coefficients: synthetic });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).not.toBeInstanceOf(NoMatchingSubrangeError);
      }
    });

    it('logs the resolved subrange at debug level', () => {
      const logger = createCapturingLogger();

      new SplitWindowEstimator(scene, { coefficients: synthetic, logger });

      expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
        [
          'debug',
          'Resolved column water vapour subrange',
          { columnWaterVapour: 1.5, subrange: 'Dry', rmse: 0.25 },
        ],
      ]);
    });
  });

  describe('logging', () => {
    it('writes nothing to the console without a logger', () => {
      const spies = (['debug', 'info', 'warn', 'error'] as const).map((level) =>
        vi.spyOn(console, level).mockImplementation(() => {})
      );

      try {
        new SplitWindowEstimator(scene, { coefficients: overlapping, random: () => 0 });
        for (const spy of spies) {
          expect(spy).not.toHaveBeenCalled();
        }
      } finally {
        for (const spy of spies) {
          spy.mockRestore();
        }
      }
    });
  });

  describe('computeLst', () => {
    it('evaluates the equation with the resolved coefficients', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.computeLst(300.0, 295.0)).toBeCloseTo(203.5723208415516, 10);
    });

    it('reduces to b0 + b1 when the other coefficients vanish', () => {
      const provider = createProvider([
        createSubrange({ b0: -1.0, b1: 4.0, b2: 0, b3: 0, b4: 0, b5: 0, b6: 0, b7: 0 }),
      ]);
      const estimator = new SplitWindowEstimator(
        { emissivityB10: 0.98, emissivityB11: 0.98, columnWaterVapour: 2.0 },
        { coefficients: provider }
      );

      expect(estimator.computeLst(300.0, 295.0)).toBe(3.0);
      expect(estimator.computeLst(280.0, 310.0)).toBe(3.0);
    });

    it('keeps the resolved coefficients fixed', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });
      const before = estimator.computeLst(300.0, 295.0);

      expect(Object.isFrozen(estimator.coefficients)).toBe(true);
      expect(Reflect.set(estimator.coefficients, 'b0', 1000)).toBe(false);
      expect(estimator.coefficients.b0).toBe(1);
      expect(estimator.getCoefficients()[0]).toBe(1);
      expect(estimator.computeLst(300.0, 295.0)).toBe(before);
    });

    it('returns the same value for the same inputs', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });
      const first = estimator.computeLst(301.2, 299.8);

      expect(estimator.computeLst(301.2, 299.8)).toBe(first);
      expect(estimator.computeLst(301.2, 299.8)).toBe(first);
    });

    it('depends on the order of the brightness temperatures', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.computeLst(295.0, 300.0)).toBeCloseTo(178.17126890203812, 10);
    });

    it('records the last result', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });
      expect(estimator.lastLst).toBeUndefined();

      const lst = estimator.computeLst(300.0, 295.0);

      expect(estimator.lastLst).toBe(lst);
    });

    it('checks t10 before t11', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      try {
        estimator.computeLst(0, 70000);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutOfRangeInputError);
        if (error instanceof OutOfRangeInputError) {
          expect(error.operand).toBe('t10');
          expect(error.value).toBe(0);
        }
      }
    });

    it('reports an out-of-range t11', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      try {
        estimator.computeLst(300, 65536);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutOfRangeInputError);
        if (error instanceof OutOfRangeInputError) {
          expect(error.operand).toBe('t11');
          expect(error.value).toBe(65536);
        }
      }
    });

    it('leaves the last result untouched when an input is rejected', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });
      const lst = estimator.computeLst(300.0, 295.0);

      expect(() => estimator.computeLst(300.0, 0)).toThrow(OutOfRangeInputError);
      expect(estimator.lastLst).toBe(lst);
    });
  });

  describe('rendering', () => {
    it('builds the mapcalc formula over the default placeholders', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.mapcalc).toBe(
        '1 + (2 + (3)*((1-0.975)/0.975)) + ' +
          '(4)*(-0.010000000000000009/0.975) * ((Input_T10 + Input_T11)/2) + ' +
          '(5 + (6)*((1-0.975)/0.975) + (7)*(-0.010000000000000009/0.975^2))*((Input_T10 - Input_T11)/2) + ' +
          '(8)*(Input_T10 - Input_T11)^2'
      );
      expect(estimator.renderFormula()).toBe(estimator.mapcalc);
    });

    it('renders with custom placeholders', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.renderFormula('A', 'B').endsWith('(8)*(A - B)^2')).toBe(true);
    });

    it('builds the model with the band emissivities', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.model).toBe(
        '[1 + (2 + 3*((1-0.975)/0.975)) + ' +
          '4*(-0.010000000000000009/0.975) * ((0.97 + 0.98)/2) + ' +
          '(5 + 6*((1-0.975)/0.975) + 7*(-0.010000000000000009/0.975^2))*((0.97 - 0.98)/2) + ' +
          '8*(0.97 - 0.98)^2]\n'
      );
    });

    it('describes itself with the equation and the model', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.toString()).toBe(
        '   > The equation: ' + EQUATION + '\n' + '   > The model: ' + estimator.model
      );
    });

    it('reports the RMSE', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.reportRmse()).toBe('Associated RMSE: 0.25');
    });

    it('carries the citation', () => {
      const estimator = new SplitWindowEstimator(scene, { coefficients: synthetic });

      expect(estimator.citation).toBe(CITATION);
      expect(estimator.citation).toContain('Remote Sens. 7, no. 1: 647-665');
    });
  });
});

describe('createSplitWindowEstimator', () => {
  it('creates an estimator', () => {
    const estimator = createSplitWindowEstimator(scene, { coefficients: synthetic });

    expect(estimator).toBeInstanceOf(SplitWindowEstimator);
    expect(estimator.subrange.key).toBe('Dry');
  });
});

describe('createEstimatorForLandCover', () => {
  const emissivities = createInMemoryEmissivityProvider([
    { landCover: 'Cropland', b10: 0.971, b11: 0.968 },
    { landCover: 'Forest', b10: 0.995, b11: 0.996 },
  ]);

  it('uses the emissivities of the class', () => {
    const estimator = createEstimatorForLandCover('Cropland', 1.2, {
      coefficients: synthetic,
      emissivities,
    });

    expect(estimator.emissivityT10).toBe(0.971);
    expect(estimator.emissivityT11).toBe(0.968);
    expect(estimator.columnWaterVapour).toBe(1.2);
  });

  it('raises UnknownLandCoverError for a missing class', () => {
    expect(() =>
      createEstimatorForLandCover('Glacier', 1.2, { coefficients: synthetic, emissivities })
    ).toThrow(UnknownLandCoverError);
  });
});

describe('with the bundled Du et al. tables', () => {
  let providers: LoadedProviders;

  beforeAll(async () => {
    providers = await loadDefaultProviders({ env: {} });
  });

  it('matches the hand-evaluated equation for e10=0.97, e11=0.98, cwv=1.5', () => {
    // cwv 1.5 lies in Range_1 (0.0, 2.5) and Range_6 (0.0, 6.3); take Range_1.
    const estimator = createSplitWindowEstimator(
      { emissivityB10: 0.97, emissivityB11: 0.98, columnWaterVapour: 1.5 },
      { coefficients: providers.coefficients, tieBreak: 'first' }
    );

    const [b0, b1, b2, b3, b4, b5, b6, b7] = [
      -2.78009, 1.01408, 0.15833, -0.34991, 4.04487, 3.55414, -8.88394, 0.09152,
    ];
    const ae = 0.975;
    const de = 0.97 - 0.98;
    const t10 = 300.0;
    const t11 = 295.0;
    const expected =
      b0 +
      (b1 + b2 * ((1 - ae) / ae)) +
      b3 * (de / ae) * ((t10 + t11) / 2) +
      (b4 + b5 * ((1 - ae) / ae) + b6 * (de / ae ** 2)) * ((t10 - t11) / 2) +
      b7 * (t10 - t11) ** 2;

    expect(estimator.subrange.key).toBe('Range_1');
    expect(estimator.rmse).toBe(0.34);
    expect(estimator.computeLst(t10, t11)).toBe(expected);
    expect(estimator.computeLst(t10, t11)).toBeCloseTo(12.167362521367524, 10);
  });

  it('picks the whole-domain subrange when the generator says so', () => {
    const estimator = createSplitWindowEstimator(
      { emissivityB10: 0.97, emissivityB11: 0.98, columnWaterVapour: 1.5 },
      { coefficients: providers.coefficients, random: () => 0.75 }
    );

    expect(estimator.subrange.key).toBe('Range_6');
    expect(estimator.computeLst(300.0, 295.0)).toBeCloseTo(17.750259095989485, 10);
  });

  it('rejects the bundled table as ambiguous under the strict policy', () => {
    expect(() =>
      createSplitWindowEstimator(
        { emissivityB10: 0.97, emissivityB11: 0.98, columnWaterVapour: 1.5 },
        { coefficients: providers.coefficients, tieBreak: 'strict' }
      )
    ).toThrow(AmbiguousSubrangeError);
  });

  it('builds an estimator from a bundled land cover class', () => {
    const estimator = createEstimatorForLandCover('Cropland', 1.2, {
      coefficients: providers.coefficients,
      emissivities: providers.emissivities,
      tieBreak: 'first',
    });

    expect(estimator.averageEmissivity).toBe(0.5 * (0.971 + 0.968));
    expect(estimator.computeLst(301.2, 299.8)).toBeCloseTo(0.9828111011492607, 10);
  });
});
