import { ValidateBy, buildMessage, type ValidationOptions } from "class-validator";
import { isIsoDate } from "../iso-date";

export const IsIsoDate = (options?: ValidationOptions): PropertyDecorator =>
  ValidateBy(
    {
      name: "isIsoDate",
      validator: {
        validate: (value: unknown) => isIsoDate(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a calendar date (YYYY-MM-DD)`,
          options,
        ),
      },
    },
    options,
  );
