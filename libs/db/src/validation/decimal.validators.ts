import {
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from "class-validator";
import { Decimal, parseDecimal } from "../decimal";

export const IsPositiveDecimal = (
  options?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: "isPositiveDecimal",
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gt(0);
        },
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a positive decimal`,
          options,
        ),
      },
    },
    options,
  );

export const IsNonNegativeDecimal = (
  options?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: "isNonNegativeDecimal",
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gte(0);
        },
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a decimal >= 0`,
          options,
        ),
      },
    },
    options,
  );

/** Inclusive on both ends. */
export const IsDecimalBetween = (
  min: Decimal.Value,
  max: Decimal.Value,
  options?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: "isDecimalBetween",
      constraints: [String(min), String(max)],
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gte(min) && d.lte(max);
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be a decimal between $constraint1 and $constraint2`,
          options,
        ),
      },
    },
    options,
  );

/**
 * Fits a `decimal(precision, scale)` column: at most `scale` places after the
 * point and `precision - scale` digits before it.
 */
export const HasDecimalDigits = (
  precision: number,
  scale: number,
  options?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: "hasDecimalDigits",
      constraints: [precision, scale],
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          if (d === null) return false;
          const places = d.decimalPlaces();
          const whole = Math.max(d.precision(true) - places, 0);
          return places <= scale && whole <= precision - scale;
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must fit $constraint1 digits with $constraint2 decimal places`,
          options,
        ),
      },
    },
    options,
  );
