import {
  bigint,
  integer,
  maxValue,
  minValue,
  number,
  pipe,
  regex,
  safeParse,
  string,
  toLowerCase,
  type BaseIssue,
  type BaseSchema,
  type InferOutput,
} from "valibot";
import { BridgeError, ErrorCode } from "./errors";
import type { Address, Bytes32, Domain } from "./types";

export const MAX_DOMAIN = 0xffff_ffff;

export const addressSchema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address"),
  toLowerCase(),
);

export const bytes32Schema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte hex value"),
  toLowerCase(),
);

export const domainSchema = pipe(
  number(),
  integer("domain must be an integer"),
  minValue(0, "domain must be unsigned"),
  maxValue(MAX_DOMAIN, "domain must fit in 32 bits"),
);

export const amountSchema = pipe(bigint(), minValue(1n, "amount must be positive"));

export const decimalsSchema = pipe(
  number(),
  integer("decimals must be an integer"),
  minValue(0, "decimals must be unsigned"),
  maxValue(255, "decimals must fit in a byte"),
);

/* ── boundary parsers: throw BridgeError(InvalidArgument) ── */
const parseWith = <S extends BaseSchema<unknown, unknown, BaseIssue<unknown>>>(
  schema: S,
  field: string,
  value: unknown,
): InferOutput<S> => {
  const result = safeParse(schema, value);
  if (!result.success) {
    throw new BridgeError(
      ErrorCode.INVALID_ARGUMENT,
      `${field}: ${result.issues.map((i) => i.message).join("; ")}`,
      { field },
    );
  }
  return result.output;
};

export const parseAddress = (value: string, field = "address"): Address =>
  `0x${parseWith(addressSchema, field, value).slice(2)}`;

export const parseBytes32 = (value: string, field = "bytes32"): Bytes32 =>
  `0x${parseWith(bytes32Schema, field, value).slice(2)}`;

export const parseDomain = (value: number, field = "domain"): Domain =>
  parseWith(domainSchema, field, value);

export const parseAmount = (value: bigint, field = "amount"): bigint =>
  parseWith(amountSchema, field, value);

export const parseDecimals = (value: number, field = "decimals"): number =>
  parseWith(decimalsSchema, field, value);
