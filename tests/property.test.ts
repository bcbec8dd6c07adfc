import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { ErrorCode } from "../src/errors";
import type { DeliveryOrder } from "../src/infra/relayer";
import { ALICE, BOB, CAROL } from "./helpers/accounts";
import { DOMAIN_A, setupBridge, units } from "./helpers/bridge";
import { codeOf } from "./helpers/errors";

// repeated small amounts make byte-identical bodies likely unless sequences differ
const amount = fc.oneof(fc.constantFrom(units(1), units(5)), fc.bigInt({ min: 1n, max: units(100) }));
const user = fc.constantFrom(ALICE, BOB);
const anyone = fc.constantFrom(ALICE, BOB, CAROL);
const everyone = [ALICE, BOB, CAROL];

describe("Property-based tests", () => {
  it("applies every deposit once however often it is delivered", () => {
    fc.assert(
      fc.property(
        fc.array(fc.record({ amount, copies: fc.integer({ min: 1, max: 3 }) }), { minLength: 1, maxLength: 5 }),
        (deposits) => {
          const { rt, a, hub, tokenX, sX } = setupBridge();
          const receipts = deposits.map((d) => a.gateway.deposit(ALICE, tokenX.address, d.amount, ALICE));
          rt.settle();
          deposits.forEach((d, i) => {
            for (let k = 1; k < d.copies; k++) rt.relayer.redeliver(receipts[i].transportId);
          });

          const total = deposits.reduce((sum, d) => sum + d.amount, 0n);
          expect(hub.ledger.getBalance(ALICE, sX.address)).toBe(total);
          expect(sX.totalSupply()).toBe(total);
          expect(hub.ledger.getUserProcessedCount(ALICE)).toBe(deposits.length);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("ends in the same state for any delivery order", () => {
    const scenario = fc
      .array(fc.record({ user, to: anyone, amount }), { minLength: 1, maxLength: 6 })
      .chain((deposits) =>
        fc.tuple(
          fc.constant(deposits),
          fc.shuffledSubarray(
            deposits.map((_, i) => i),
            { minLength: deposits.length, maxLength: deposits.length },
          ),
        ),
      );

    fc.assert(
      fc.property(scenario, ([deposits, permutation]) => {
        const run = (order?: DeliveryOrder) => {
          const { rt, a, hub, tokenX, sX } = setupBridge();
          const receipts = deposits.map((d) => a.gateway.deposit(d.user, tokenX.address, d.amount, d.to));
          rt.settle(order);
          return {
            balances: everyone.map((u) => hub.ledger.getBalance(u, sX.address)),
            processed: receipts.map((r) => [r.messageId, hub.ledger.isMessageProcessed(r.messageId)]),
          };
        };

        const fifo = run();
        const permuted = run((pending) => permutation.map((i) => pending[i]));
        expect(permuted).toEqual(fifo);
      }),
      { numRuns: 30 },
    );
  });

  it("conserves balances across deposits and withdrawals between any parties", () => {
    const op = fc.oneof(
      fc.record({ kind: fc.constant("deposit" as const), user, to: anyone, amount }),
      fc.record({ kind: fc.constant("withdraw" as const), user: anyone, to: anyone, amount }),
    );

    fc.assert(
      fc.property(fc.array(op, { maxLength: 8 }), (ops) => {
        const { rt, a, hub, tokenX, sX } = setupBridge();
        const ledger = new Map<string, bigint>();
        const wallet = new Map<string, bigint>([
          [ALICE, units(1_000)],
          [BOB, units(1_000)],
          [CAROL, 0n],
        ]);
        const add = (m: Map<string, bigint>, key: string, delta: bigint) => m.set(key, (m.get(key) ?? 0n) + delta);
        let locked = 0n;

        for (const o of ops) {
          if (o.kind === "deposit") {
            a.gateway.deposit(o.user, tokenX.address, o.amount, o.to);
            rt.settle();
            add(wallet, o.user, -o.amount);
            add(ledger, o.to, o.amount);
            locked += o.amount;
          } else {
            const held = ledger.get(o.user) ?? 0n;
            const code = codeOf(() => hub.ledger.requestWithdraw(o.user, sX.address, o.amount, DOMAIN_A, o.to));
            if (o.amount > held) {
              expect(code).toBe(ErrorCode.INSUFFICIENT_BALANCE);
            } else {
              expect(code).toBe("none");
              add(ledger, o.user, -o.amount);
              add(wallet, o.to, o.amount);
              locked -= o.amount;
            }
          }

          const balances = everyone.map((u) => hub.ledger.getBalance(u, sX.address));
          expect(balances).toEqual(everyone.map((u) => ledger.get(u) ?? 0n));
          expect(balances.every((b) => b >= 0n)).toBe(true);
          const sum = balances.reduce((acc, b) => acc + b, 0n);
          expect(hub.ledger.getTotalCredited(sX.address)).toBe(sum);
          expect(sX.totalSupply()).toBe(sum);
          expect(sX.balanceOf(hub.ledger.address)).toBe(sum);
        }

        rt.settle();
        expect(a.gateway.getCustodyBalance(tokenX.address)).toBe(locked);
        expect(everyone.map((u) => tokenX.balanceOf(u))).toEqual(everyone.map((u) => wallet.get(u)));
      }),
      { numRuns: 30 },
    );
  });
});
