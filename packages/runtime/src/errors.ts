// Runtime error types

import type { SubrangeBounds } from '@thermalwin/protocol';
import { DN_MAX, DN_MIN } from './constants.js';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Which brightness temperature an input check refers to.
 */
export type BrightnessOperand = 't10' | 't11';

/**
 * Error when a brightness-temperature digital number is outside [1, 65535].
 */
export class OutOfRangeInputError extends ValidationError {
  readonly operand: BrightnessOperand;
  readonly value: number;

  constructor(operand: BrightnessOperand, value: number) {
    super(
      `The input value for ${operand.toUpperCase()} is out of the expected range [${DN_MIN},${DN_MAX}]: ${value}`,
      { field: operand, details: { value, min: DN_MIN, max: DN_MAX } }
    );
    this.name = 'OutOfRangeInputError';
    this.operand = operand;
    this.value = value;
  }
}

/**
 * Error when an emissivity is outside (0, 1] or the average emissivity is zero.
 */
export class InvalidEmissivityError extends ValidationError {
  readonly value: number;

  constructor(field: string, value: number, reason = 'must lie in (0, 1]') {
    super(`Invalid emissivity ${field}=${value}: ${reason}`, {
      field,
      details: { value },
    });
    this.name = 'InvalidEmissivityError';
    this.value = value;
  }
}

/**
 * Error when no coefficient subrange contains the column water vapour value.
 */
export class NoMatchingSubrangeError extends RuntimeError {
  readonly columnWaterVapour: number;
  readonly subranges: SubrangeBounds[];

  constructor(columnWaterVapour: number, subranges: SubrangeBounds[]) {
    super(
      'NO_MATCHING_SUBRANGE',
      `No column water vapour subrange contains ${columnWaterVapour}`
    );
    this.name = 'NoMatchingSubrangeError';
    this.columnWaterVapour = columnWaterVapour;
    this.subranges = subranges;
  }
}

/**
 * Error when several subranges contain the column water vapour value and the
 * tie-break policy is 'strict'.
 */
export class AmbiguousSubrangeError extends RuntimeError {
  readonly columnWaterVapour: number;
  readonly keys: string[];

  constructor(columnWaterVapour: number, keys: string[]) {
    super(
      'AMBIGUOUS_SUBRANGE',
      `Column water vapour ${columnWaterVapour} lies in ${keys.length} subranges: ${keys.join(', ')}`
    );
    this.name = 'AmbiguousSubrangeError';
    this.columnWaterVapour = columnWaterVapour;
    this.keys = keys;
  }
}

/**
 * Error when a land cover class has no emissivity entry.
 */
export class UnknownLandCoverError extends RuntimeError {
  readonly landCover: string;

  constructor(landCover: string) {
    super('UNKNOWN_LAND_COVER', `No emissivities for land cover class: ${landCover}`);
    this.name = 'UnknownLandCoverError';
    this.landCover = landCover;
  }
}
