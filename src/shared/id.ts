import { monotonicFactory } from "ulid";

const ulid = monotonicFactory();

type IdPrefix = "run";

export const ID_PREFIXES = {
  RUN: "run" as const,
};

export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${ulid()}`;
}
