// Bridge message body: rlp([kind, token, recipient, amount, originDomain, sequence]).

import { decode, encode, type NestedUint8Array } from "rlp";
import { BridgeError, ErrorCode } from "../errors";
import { MAX_DOMAIN } from "../schema";
import { MessageKind, type BridgeMessage } from "../types";
import { bytesToBigInt, bytesToHex, equalBytes, hexToBytes } from "../utils/bytes";

const FIELDS = 6;
const ADDRESS_BYTES = 20;
const MAX_UINT256 = (1n << 256n) - 1n;

/* ── encode ─────────────────────────────────────────────── */
export const encodeMessage = (m: BridgeMessage): Uint8Array => {
  if (m.amount < 0n || m.amount > MAX_UINT256) {
    throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "amount out of uint256 range");
  }
  if (m.sequence < 0n || m.sequence > MAX_UINT256) {
    throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "sequence out of uint256 range");
  }
  return encode([
    m.kind,
    hexToBytes(m.token),
    hexToBytes(m.recipient),
    m.amount,
    m.originDomain,
    m.sequence,
  ]);
};

/* ── decode (fail closed) ──────────────────────────────── */
const malformed = (reason: string, cause?: unknown): BridgeError =>
  new BridgeError(ErrorCode.MALFORMED_MESSAGE, `malformed message: ${reason}`, { reason }, { cause });

const isFlatList = (v: Uint8Array | NestedUint8Array): v is Uint8Array[] =>
  Array.isArray(v) && v.every((item) => item instanceof Uint8Array);

const toKind = (raw: Uint8Array): MessageKind => {
  const n = raw.length > 1 ? -1 : Number(bytesToBigInt(raw));
  if (n === MessageKind.Deposit) return MessageKind.Deposit;
  if (n === MessageKind.Release) return MessageKind.Release;
  throw new BridgeError(ErrorCode.INVALID_MESSAGE_KIND, `unknown message kind ${bytesToHex(raw)}`, {
    kind: bytesToHex(raw),
  });
};

export const decodeMessage = (body: Uint8Array): BridgeMessage => {
  let decoded: Uint8Array | NestedUint8Array;
  try {
    decoded = decode(body);
  } catch (err) {
    throw malformed("invalid rlp", err);
  }
  if (!isFlatList(decoded)) throw malformed("expected a flat list");
  if (decoded.length !== FIELDS) throw malformed(`expected ${FIELDS} fields, got ${decoded.length}`);

  const [kind, token, recipient, amount, originDomain, sequence] = decoded;
  if (token.length !== ADDRESS_BYTES) throw malformed("token must be 20 bytes");
  if (recipient.length !== ADDRESS_BYTES) throw malformed("recipient must be 20 bytes");
  if (amount.length > 32) throw malformed("amount exceeds uint256");
  if (sequence.length > 32) throw malformed("sequence exceeds uint256");
  if (originDomain.length > 4) throw malformed("origin domain exceeds uint32");

  const message: BridgeMessage = {
    kind: toKind(kind),
    token: bytesToHex(token),
    recipient: bytesToHex(recipient),
    amount: bytesToBigInt(amount),
    originDomain: Number(bytesToBigInt(originDomain)),
    sequence: bytesToBigInt(sequence),
  };
  if (message.amount === 0n) throw malformed("amount must be positive");
  if (message.originDomain > MAX_DOMAIN) throw malformed("origin domain exceeds uint32");

  // non-canonical integers (leading zeros) survive rlp.decode; reject them here
  if (!equalBytes(encodeMessage(message), body)) throw malformed("non-canonical encoding");
  return message;
};
