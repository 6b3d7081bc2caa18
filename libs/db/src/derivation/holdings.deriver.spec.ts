import type { DataSource } from "typeorm";
import { createDataSource } from "../data-source";
import { Decimal } from "../decimal";
import type { Diagnostics } from "../diagnostics";
import { PortfolioHolding } from "../entities";
import { PortfolioNotFoundError, PortfolioPreconditionError } from "../errors";
import { EntityStore } from "../store/entity.store";
import { UpsertService } from "../store/upsert.service";
import { HoldingsDeriver } from "./holdings.deriver";

describe("HoldingsDeriver", () => {
  let dataSource: DataSource;
  let upserts: UpsertService;
  let store: EntityStore;
  let deriver: HoldingsDeriver;
  let warnings: string[];
  let errors: string[];

  beforeEach(async () => {
    dataSource = createDataSource({ driver: "sqljs", synchronize: true, logging: false });
    await dataSource.initialize();
    upserts = new UpsertService(dataSource);
    store = new EntityStore(dataSource);
    warnings = [];
    errors = [];
    const diagnostics: Diagnostics = {
      log: () => undefined,
      warn: (m) => warnings.push(m),
      error: (m) => errors.push(m),
    };
    deriver = new HoldingsDeriver(store, upserts, diagnostics);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  const portfolio = (name = "Portfolio 1") =>
    upserts.upsertPortfolio({
      name,
      initialValue: new Decimal("1000000000.00"),
      initialDate: "2022-02-15",
    });

  it("writes (w × V₀) / p for each weighted asset", async () => {
    const p = await portfolio();
    const eeuu = await upserts.upsertAsset({ name: "EEUU" });
    const europa = await upserts.upsertAsset({ name: "Europa" });
    await upserts.upsertWeight({ portfolio: p, asset: eeuu, initialWeight: new Decimal("0.28") });
    await upserts.upsertWeight({ portfolio: p, asset: europa, initialWeight: new Decimal("0.72") });
    await upserts.upsertPrice({ asset: eeuu, date: "2022-02-15", price: new Decimal("100.00") });
    await upserts.upsertPrice({ asset: europa, date: "2022-02-15", price: new Decimal("200") });
    await upserts.upsertPrice({ asset: europa, date: "2022-02-16", price: new Decimal("1") });

    const res = await deriver.derive("Portfolio 1");

    expect(res.date).toBe("2022-02-15");
    expect([...res.holdings.keys()].sort()).toEqual(["EEUU", "Europa"]);
    expect(res.holdings.get("EEUU")?.quantity.toFixed(8)).toBe("2800000.00000000");
    expect(res.holdings.get("Europa")?.quantity.toFixed(8)).toBe("3600000.00000000");

    const stored = await store.findHolding(p, eeuu, "2022-02-15");
    expect(stored?.quantity.toFixed(8)).toBe("2800000.00000000");
  });

  it("stores exactly the quantity it returns", async () => {
    const p = await portfolio();
    const oro = await upserts.upsertAsset({ name: "Oro" });
    await upserts.upsertWeight({ portfolio: p, asset: oro, initialWeight: new Decimal("0.15") });
    await upserts.upsertPrice({ asset: oro, date: "2022-02-15", price: new Decimal("0.07") });

    const res = await deriver.derive("Portfolio 1");
    const stored = await store.findHolding(p, oro, "2022-02-15");

    expect(res.holdings.get("Oro")?.quantity.toFixed(8)).toBe("2142857142.85714286");
    expect(stored?.quantity.toFixed(8)).toBe("2142857142.85714286");
  });

  it("is idempotent", async () => {
    const p = await portfolio();
    const eeuu = await upserts.upsertAsset({ name: "EEUU" });
    await upserts.upsertWeight({ portfolio: p, asset: eeuu, initialWeight: new Decimal("0.5") });
    await upserts.upsertPrice({ asset: eeuu, date: "2022-02-15", price: new Decimal("4") });

    await deriver.derive("Portfolio 1");
    await deriver.derive("Portfolio 1");

    const holdings = await dataSource.getRepository(PortfolioHolding).find();
    expect(holdings).toHaveLength(1);
    expect(holdings[0].quantity.toString()).toBe("125000000");
  });

  it("skips an asset without a t₀ price and warns", async () => {
    const p = await portfolio();
    const eeuu = await upserts.upsertAsset({ name: "EEUU" });
    const oro = await upserts.upsertAsset({ name: "Oro" });
    await upserts.upsertWeight({ portfolio: p, asset: eeuu, initialWeight: new Decimal("0.5") });
    await upserts.upsertWeight({ portfolio: p, asset: oro, initialWeight: new Decimal("0.5") });
    await upserts.upsertPrice({ asset: eeuu, date: "2022-02-15", price: new Decimal("10") });
    await upserts.upsertPrice({ asset: oro, date: "2022-02-16", price: new Decimal("10") });

    const res = await deriver.derive("Portfolio 1");

    expect([...res.holdings.keys()]).toEqual(["EEUU"]);
    expect(res.skipped.map((s) => [s.assetName, s.reason])).toEqual([
      ["Oro", "missing-price"],
    ]);
    expect(warnings).toEqual([
      "Portfolio 1: skipping Oro, no price for Oro on the initial date",
    ]);
    expect(await store.findHolding(p, oro, "2022-02-15")).toBeNull();
  });

  it("returns nothing for a portfolio without weights", async () => {
    await portfolio();

    const res = await deriver.derive("Portfolio 1");

    expect(res.holdings.size).toBe(0);
    expect(warnings).toEqual(["Portfolio 1: no weights on record, nothing to derive"]);
  });

  it("refuses a portfolio without an initial value", async () => {
    await upserts.upsertPortfolio({ name: "Bare", initialDate: "2022-02-15" });

    const err = await deriver.derive("Bare").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PortfolioPreconditionError);
    if (!(err instanceof PortfolioPreconditionError)) return;
    expect(err.missing).toEqual(["initialValue"]);
  });

  it("refuses an unknown portfolio", async () => {
    await expect(deriver.derive("Nope")).rejects.toBeInstanceOf(PortfolioNotFoundError);
  });

  it("keeps deriving the batch past a broken portfolio", async () => {
    const p = await portfolio("Portfolio 2");
    await upserts.upsertPortfolio({ name: "Portfolio 1" });
    const eeuu = await upserts.upsertAsset({ name: "EEUU" });
    await upserts.upsertWeight({ portfolio: p, asset: eeuu, initialWeight: new Decimal("1") });
    await upserts.upsertPrice({ asset: eeuu, date: "2022-02-15", price: new Decimal("8") });

    const batch = await deriver.deriveAll();

    expect(batch.failures.map((f) => f.portfolio)).toEqual(["Portfolio 1"]);
    expect(batch.derived.map((d) => d.portfolio.name)).toEqual(["Portfolio 2"]);
    expect(batch.derived[0].holdings.get("EEUU")?.quantity.toString()).toBe("125000000");
    expect(errors).toEqual([
      "Portfolio 1: derivation failed: Portfolio Portfolio 1 is missing initialValue and initialDate",
    ]);
  });
});
