import { describe, expect, it } from "vitest";
import { deriveAddress } from "../src/core/hash";
import { ErrorCode } from "../src/errors";
import { Chain } from "../src/infra/chain";
import { Mailbox } from "../src/infra/mailbox";
import { ALICE } from "./helpers/accounts";
import { codeOf } from "./helpers/errors";

describe("Chain transactions", () => {
  it("commits every write of a successful call", () => {
    const chain = new Chain(1, "test");
    const t = chain.table<number>("t");
    chain.transact(() => {
      t.set("a", 1);
      t.set("b", 2);
      chain.emit(ALICE, { type: "TokenWhitelisted", token: ALICE });
    });
    expect(t.entries()).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(chain.events()).toHaveLength(1);
  });

  it("undoes writes, deletes and events when the call throws", () => {
    const chain = new Chain(1, "test");
    const t = chain.table<number>("t");
    const s = chain.slot<string>("s", "initial");
    chain.transact(() => {
      t.set("keep", 1);
      t.set("gone", 2);
    });

    expect(() =>
      chain.transact(() => {
        t.set("keep", 10);
        t.delete("gone");
        t.set("new", 3);
        s.set("changed");
        chain.emit(ALICE, { type: "TokenRemoved", token: ALICE });
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(t.get("keep")).toBe(1);
    expect(t.get("gone")).toBe(2);
    expect(t.has("new")).toBe(false);
    expect(s.get()).toBe("initial");
    expect(chain.events()).toHaveLength(0);
  });

  it("rolls back a failed nested call without touching the outer one", () => {
    const chain = new Chain(1, "test");
    const t = chain.table<number>("t");
    let inner: unknown;
    chain.transact(() => {
      t.set("a", 1);
      try {
        chain.transact(() => {
          t.set("b", 2);
          throw new Error("inner");
        });
      } catch (err) {
        inner = err;
      }
      t.set("c", 3);
    });
    expect(inner).toBeInstanceOf(Error);
    expect(t.keys()).toEqual(["a", "c"]);
  });

  it("refuses writes outside a transaction", () => {
    const chain = new Chain(1, "test");
    const t = chain.table<number>("t");
    expect(codeOf(() => t.set("a", 1))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(chain.inTransaction).toBe(false);
  });

  it("insertUnique rejects an existing key", () => {
    const chain = new Chain(1, "test");
    const t = chain.table<true>("processed");
    chain.transact(() => t.insertUnique("id", true));
    expect(codeOf(() => chain.transact(() => t.insertUnique("id", true)))).toBe(ErrorCode.ALREADY_PROCESSED);
  });

  it("filters events by type", () => {
    const chain = new Chain(1, "test");
    chain.transact(() => {
      chain.emit(ALICE, { type: "TokenWhitelisted", token: ALICE });
      chain.emit(ALICE, { type: "TokenRemoved", token: ALICE });
    });
    expect(chain.eventsOf("TokenRemoved")).toEqual([{ type: "TokenRemoved", token: ALICE }]);
  });
});

describe("Chain contracts", () => {
  it("assigns deterministic addresses per domain and deploy order", () => {
    const one = new Chain(7, "one");
    const two = new Chain(7, "two");
    const m1 = new Mailbox(one);
    const m2 = new Mailbox(two);
    expect(m1.address).toBe(m2.address);
    expect(m1.address).toBe(deriveAddress(7, 0));
    expect(deriveAddress(7, 1)).not.toBe(deriveAddress(8, 1));
  });

  it("resolves contracts by address in any case", () => {
    const chain = new Chain(1, "test");
    const mailbox = new Mailbox(chain);
    expect(chain.contractAt(`0x${mailbox.address.slice(2).toUpperCase()}`)).toBe(mailbox);
    expect(chain.contractAt(ALICE)).toBeUndefined();
  });
});
