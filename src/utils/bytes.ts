import { bytesToHex as toHex, hexToBytes as fromHex } from "@noble/hashes/utils";
import type { Address, Bytes32, Hex } from "../types";

export const ZERO_ADDRESS: Address = `0x${"0".repeat(40)}`;

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;

export const hexToBytes = (hex: Hex): Uint8Array => fromHex(hex.slice(2));

/** Minimal big-endian encoding; an empty array is zero. */
export const bytesToBigInt = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(`0x${toHex(b)}`);

export const equalBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((x, i) => x === b[i]);

/* ── 20-byte address <-> 32-byte message sender ─────────── */
export const addressToBytes32 = (address: Address): Bytes32 =>
  `0x${"0".repeat(24)}${address.slice(2).toLowerCase()}`;

export const bytes32ToAddress = (value: Bytes32): Address =>
  `0x${value.slice(-40).toLowerCase()}`;

export const isZeroAddress = (address: Address): boolean =>
  address.toLowerCase() === ZERO_ADDRESS;
