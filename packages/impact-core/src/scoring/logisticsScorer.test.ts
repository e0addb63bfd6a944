import test from "node:test";
import assert from "node:assert/strict";
import { loadFactorTables } from "../factors/factorTables.js";
import { scoreLogistics } from "./logisticsScorer.js";

const tables = loadFactorTables();

test("scoreLogistics: intercontinental sea freight", () => {
    const result = scoreLogistics("India", "Germany", 0.25, tables);
    assert.equal(result.profile.tier, "intercontinental");
    assert.equal(result.logisticsScore, 35);
    assert.equal(result.co2PerKg, 0.6);
    assert.equal(result.co2Kg, 0.15);
});

test("scoreLogistics: same country yields the best tier", () => {
    const domestic = scoreLogistics("DE", "Germany", 1, tables);
    const regional = scoreLogistics("Germany", "Poland", 1, tables);
    const intercontinental = scoreLogistics("China", "United States", 1, tables);

    assert.equal(domestic.logisticsScore, 95);
    assert.ok(domestic.logisticsScore > regional.logisticsScore);
    assert.ok(regional.logisticsScore > intercontinental.logisticsScore);
    assert.ok(domestic.co2PerKg < regional.co2PerKg);
    assert.ok(regional.co2PerKg < intercontinental.co2PerKg);
});

test("scoreLogistics: shipping mode penalty and multiplier", () => {
    const air = scoreLogistics("Germany", "Germany", 2, tables, "air");
    assert.equal(air.logisticsScore, 65);
    assert.ok(Math.abs(air.co2PerKg - 2.5) < 1e-9);
    assert.ok(Math.abs(air.co2Kg - 5) < 1e-9);

    const road = scoreLogistics("Germany", "Poland", 1, tables, "road");
    assert.equal(road.logisticsScore, 60);
});

test("scoreLogistics: score floored at 0 and capped at 100 for every tier and mode", () => {
    const routes: [string, string][] = [["de", "de"], ["de", "pl"], ["cn", "us"], ["??", "de"]];
    for (const [origin, destination] of routes) {
        for (const mode of ["sea", "rail", "road", "air"] as const) {
            const { logisticsScore } = scoreLogistics(origin, destination, 1, tables, mode);
            assert.ok(logisticsScore >= 0 && logisticsScore <= 100, `${origin}->${destination} ${mode}`);
        }
    }
});
