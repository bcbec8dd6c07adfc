import { describe, expect, it } from "vitest";
import { encode } from "rlp";
import { decodeMessage, encodeMessage } from "../src/codec/message";
import { messageIdOf } from "../src/core/hash";
import { ErrorCode } from "../src/errors";
import { MessageKind, type BridgeMessage } from "../src/types";
import { addressToBytes32, bytesToHex, hexToBytes } from "../src/utils/bytes";
import { codeOf } from "./helpers/errors";

const TOKEN = `0x${"11".repeat(20)}` as const;
const RECIPIENT = `0x${"22".repeat(20)}` as const;

const sample: BridgeMessage = {
  kind: MessageKind.Deposit,
  token: TOKEN,
  recipient: RECIPIENT,
  amount: 100_000000n,
  originDomain: 1,
  sequence: 0n,
};

describe("message codec", () => {
  it("encodes the six-field tuple as a flat rlp list", () => {
    const expected =
      "0xf2" + "01" + "94" + "11".repeat(20) + "94" + "22".repeat(20) + "8405f5e100" + "01" + "80";
    expect(bytesToHex(encodeMessage(sample))).toBe(expected);
  });

  it("decodes what it encodes", () => {
    const release: BridgeMessage = { ...sample, kind: MessageKind.Release, originDomain: 31337, sequence: 7n };
    expect(decodeMessage(encodeMessage(release))).toEqual(release);
  });

  it("rejects bytes that are not rlp", () => {
    const body = new Uint8Array([...encodeMessage(sample), 0x00]);
    expect(codeOf(() => decodeMessage(body))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects the wrong number of fields", () => {
    expect(codeOf(() => decodeMessage(Uint8Array.from([0xc0])))).toBe(ErrorCode.MALFORMED_MESSAGE);
    const five = encode([1, hexToBytes(TOKEN), hexToBytes(RECIPIENT), 5n, 1]);
    expect(codeOf(() => decodeMessage(five))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects nested lists", () => {
    const nested = encode([1, [hexToBytes(TOKEN)], hexToBytes(RECIPIENT), 5n, 1, 0n]);
    expect(codeOf(() => decodeMessage(nested))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects addresses that are not 20 bytes", () => {
    const short = encode([1, new Uint8Array(19), hexToBytes(RECIPIENT), 5n, 1, 0n]);
    expect(codeOf(() => decodeMessage(short))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects an unknown kind", () => {
    const body = encode([3, hexToBytes(TOKEN), hexToBytes(RECIPIENT), 5n, 1, 0n]);
    expect(codeOf(() => decodeMessage(body))).toBe(ErrorCode.INVALID_MESSAGE_KIND);
  });

  it("rejects a zero amount", () => {
    const body = encode([1, hexToBytes(TOKEN), hexToBytes(RECIPIENT), 0n, 1, 0n]);
    expect(codeOf(() => decodeMessage(body))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects integers with leading zeros", () => {
    const body = encode([1, hexToBytes(TOKEN), hexToBytes(RECIPIENT), Uint8Array.from([0, 5]), 1, 0n]);
    expect(codeOf(() => decodeMessage(body))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("rejects an origin domain wider than 32 bits", () => {
    const body = encode([1, hexToBytes(TOKEN), hexToBytes(RECIPIENT), 5n, 2n ** 32n, 0n]);
    expect(codeOf(() => decodeMessage(body))).toBe(ErrorCode.MALFORMED_MESSAGE);
  });

  it("refuses to encode a negative amount", () => {
    expect(codeOf(() => encodeMessage({ ...sample, amount: -1n }))).toBe(ErrorCode.INVALID_ARGUMENT);
  });
});

describe("messageIdOf", () => {
  const sender = addressToBytes32(`0x${"33".repeat(20)}`);

  it("is stable for the same origin, sender and body", () => {
    const body = encodeMessage(sample);
    expect(messageIdOf(1, sender, body)).toBe(messageIdOf(1, sender, Uint8Array.from(body)));
  });

  it("separates deposits that differ only in sequence", () => {
    const first = messageIdOf(1, sender, encodeMessage(sample));
    const second = messageIdOf(1, sender, encodeMessage({ ...sample, sequence: 1n }));
    expect(first).not.toBe(second);
  });

  it("binds the origin domain and sender", () => {
    const body = encodeMessage(sample);
    const other = addressToBytes32(`0x${"44".repeat(20)}`);
    expect(messageIdOf(1, sender, body)).not.toBe(messageIdOf(2, sender, body));
    expect(messageIdOf(1, sender, body)).not.toBe(messageIdOf(1, other, body));
  });
});
