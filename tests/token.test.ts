import { beforeEach, describe, expect, it } from "vitest";
import { SyntheticAsset } from "../src/core/syntheticAsset";
import { CollateralToken } from "../src/core/token";
import { ErrorCode } from "../src/errors";
import { Chain } from "../src/infra/chain";
import { ZERO_ADDRESS } from "../src/utils/bytes";
import { ALICE, BOB, CAROL, OWNER } from "./helpers/accounts";
import { codeOf } from "./helpers/errors";

describe("CollateralToken", () => {
  let chain: Chain;
  let token: CollateralToken;

  beforeEach(() => {
    chain = new Chain(1, "alpha");
    token = new CollateralToken(chain, { name: "Token X", symbol: "X", decimals: 6, owner: OWNER });
    token.mint(OWNER, ALICE, 500n);
  });

  it("lets only the owner mint", () => {
    expect(token.balanceOf(ALICE)).toBe(500n);
    expect(token.totalSupply()).toBe(500n);
    expect(codeOf(() => token.mint(ALICE, ALICE, 1n))).toBe(ErrorCode.UNAUTHORIZED);
    expect(chain.eventsOf("Transfer")).toEqual([{ type: "Transfer", from: ZERO_ADDRESS, to: ALICE, amount: 500n }]);
  });

  it("transfers and fails on a short balance without side effects", () => {
    token.transfer(ALICE, BOB, 200n);
    expect(token.balanceOf(ALICE)).toBe(300n);
    expect(token.balanceOf(BOB)).toBe(200n);

    expect(codeOf(() => token.transfer(BOB, CAROL, 201n))).toBe(ErrorCode.INSUFFICIENT_FUNDS);
    expect(token.balanceOf(BOB)).toBe(200n);
    expect(token.balanceOf(CAROL)).toBe(0n);
  });

  it("spends allowances in transferFrom", () => {
    token.approve(ALICE, BOB, 150n);
    expect(token.allowance(ALICE, BOB)).toBe(150n);

    token.transferFrom(BOB, ALICE, CAROL, 100n);
    expect(token.allowance(ALICE, BOB)).toBe(50n);
    expect(token.balanceOf(CAROL)).toBe(100n);

    expect(codeOf(() => token.transferFrom(BOB, ALICE, CAROL, 51n))).toBe(ErrorCode.INSUFFICIENT_FUNDS);
    expect(token.allowance(ALICE, BOB)).toBe(50n);
  });

  it("rejects negative amounts and the zero recipient", () => {
    expect(codeOf(() => token.transfer(ALICE, BOB, -1n))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => token.transfer(ALICE, ZERO_ADDRESS, 1n))).toBe(ErrorCode.INVALID_ARGUMENT);
  });
});

describe("SyntheticAsset", () => {
  let chain: Chain;
  let minter: CollateralToken;
  let asset: SyntheticAsset;

  beforeEach(() => {
    chain = new Chain(31337, "hub");
    // any deployed address can act as the minter
    minter = new CollateralToken(chain, { name: "M", symbol: "M", decimals: 0, owner: OWNER });
    asset = new SyntheticAsset(chain, { name: "Synthetic X", symbol: "sX", decimals: 6, minter: minter.address });
  });

  it("mints and burns only for the minter", () => {
    asset.mint(minter.address, ALICE, 1_000n);
    asset.burn(minter.address, ALICE, 400n);
    expect(asset.balanceOf(ALICE)).toBe(600n);
    expect(asset.totalSupply()).toBe(600n);

    expect(codeOf(() => asset.mint(OWNER, ALICE, 1n))).toBe(ErrorCode.UNAUTHORIZED);
    expect(codeOf(() => asset.burn(ALICE, ALICE, 1n))).toBe(ErrorCode.UNAUTHORIZED);
  });

  it("cannot burn more than the holder has", () => {
    asset.mint(minter.address, ALICE, 10n);
    expect(codeOf(() => asset.burn(minter.address, ALICE, 11n))).toBe(ErrorCode.INSUFFICIENT_FUNDS);
    expect(asset.totalSupply()).toBe(10n);
  });

  it("rejects decimals outside a byte", () => {
    expect(
      codeOf(() => new SyntheticAsset(chain, { name: "bad", symbol: "B", decimals: 256, minter: minter.address })),
    ).toBe(ErrorCode.INVALID_ARGUMENT);
  });
});
