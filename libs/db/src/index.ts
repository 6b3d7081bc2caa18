import "reflect-metadata";

export * from "./entities";
export * from "./data-source";
export * from "./decimal";
export * from "./diagnostics";
export * from "./errors";
export * from "./iso-date";
export * from "./store/entity.store";
export * from "./store/upsert.service";
export * from "./derivation/initial-quantities";
export * from "./derivation/holdings.deriver";
export * from "./validation/decimal.validators";
export * from "./validation/is-iso-date";
