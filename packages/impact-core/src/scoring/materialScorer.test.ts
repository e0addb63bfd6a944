import test from "node:test";
import assert from "node:assert/strict";
import { loadFactorTables } from "../factors/factorTables.js";
import { scoreMaterials } from "./materialScorer.js";

const tables = loadFactorTables();

test("scoreMaterials: single material degenerates to a direct lookup", () => {
    const factor = tables.factorFor("organic_cotton");
    assert.deepEqual(scoreMaterials(new Map([["organic_cotton", 1]]), tables), {
        materialScore: factor.sustainability,
        co2PerKg: factor.co2PerKg,
        waterPerKg: factor.waterPerKg,
    });
});

test("scoreMaterials: share-weighted blend", () => {
    const score = scoreMaterials(new Map([["cotton", 0.6], ["polyester", 0.4]]), tables);
    // 0.6 * 48 + 0.4 * 36
    assert.equal(score.materialScore, 43.2);
    // 0.6 * 5.2 + 0.4 * 8.2
    assert.ok(Math.abs(score.co2PerKg - 6.4) < 1e-9);
    // 0.6 * 9500 + 0.4 * 95
    assert.ok(Math.abs(score.waterPerKg - 5738) < 1e-9);
});

test("scoreMaterials: unknown material uses the default factor", () => {
    assert.deepEqual(scoreMaterials(new Map([["unobtainium", 1]]), tables), {
        materialScore: 52,
        co2PerKg: 5.8,
        waterPerKg: 1800,
    });
});

test("scoreMaterials: empty composition", () => {
    assert.deepEqual(scoreMaterials(new Map(), tables), { materialScore: 52, co2PerKg: 0, waterPerKg: 0 });
});

test("scoreMaterials: score stays within [0, 100]", () => {
    for (const id of tables.summary().materials) {
        const { materialScore } = scoreMaterials(new Map([[id, 1]]), tables);
        assert.ok(materialScore >= 0 && materialScore <= 100, `${id}: ${materialScore}`);
    }
});
