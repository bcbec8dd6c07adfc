import { keccak_256 } from "@noble/hashes/sha3";
import { encode } from "rlp";
import { asMessageId, asTransportId, type MessageId, type TransportId } from "../types/brands";
import type { Address, Bytes32, Domain, Hex } from "../types";
import { bytesToHex, hexToBytes } from "../utils/bytes";

export const keccakHex = (data: Uint8Array): Hex => bytesToHex(keccak_256(data));

/* ── MessageId: the only dedupe key ─────────────────────── */
export const messageIdOf = (originDomain: Domain, sender: Bytes32, body: Uint8Array): MessageId =>
  asMessageId(keccakHex(encode([originDomain, hexToBytes(sender), body])));

/* ── transport id: unique per dispatch, unlike MessageId ── */
export const transportIdOf = (fields: {
  origin: Domain;
  nonce: number;
  sender: Bytes32;
  destination: Domain;
  recipient: Bytes32;
  body: Uint8Array;
}): TransportId =>
  asTransportId(
    keccakHex(
      encode([
        fields.origin,
        fields.nonce,
        hexToBytes(fields.sender),
        fields.destination,
        hexToBytes(fields.recipient),
        fields.body,
      ]),
    ),
  );

/* ── deterministic contract addresses ───────────────────── */
export const deriveAddress = (domain: Domain, nonce: number): Address =>
  `0x${keccakHex(encode([domain, nonce])).slice(-40)}`;
