import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../errors.js";
import { validateAssessmentRequest } from "./assessmentRequest.js";

const validBody = {
    product_name: "Organic Cotton T-Shirt",
    material_composition: { organic_cotton: 1.0 },
    weight_kg: 0.25,
    origin_country: "India",
    destination_country: "Germany",
};

function issuesOf(input: unknown): readonly string[] {
    try {
        validateAssessmentRequest(input);
    } catch (error) {
        if (error instanceof ValidationError) return error.issues;
        throw error;
    }
    assert.fail("expected a ValidationError");
}

test("validateAssessmentRequest: valid body", () => {
    const request = validateAssessmentRequest(validBody);
    assert.equal(request.productName, "Organic Cotton T-Shirt");
    assert.deepEqual([...request.composition], [["organic_cotton", 1]]);
    assert.equal(request.weightKg, 0.25);
    assert.equal(request.originCountry, "India");
    assert.equal(request.destinationCountry, "Germany");
    assert.equal(request.shippingMode, "sea");
    assert.equal(Object.isFrozen(request), true);
});

test("validateAssessmentRequest: trims names and normalizes material keys", () => {
    const request = validateAssessmentRequest({
        ...validBody,
        product_name: "  Jacket ",
        material_composition: { "Recycled Polyester": 0.6, "organic-cotton": 0.4 },
        shipping_mode: "air",
    });
    assert.equal(request.productName, "Jacket");
    assert.deepEqual([...request.composition.keys()], ["recycled_polyester", "organic_cotton"]);
    assert.equal(request.shippingMode, "air");
});

test("validateAssessmentRequest: shares not summing to 1.0 are rejected", () => {
    assert.deepEqual(issuesOf({ ...validBody, material_composition: { cotton: 0.5, polyester: 0.3 } }), [
        "material_composition: shares must sum to 1.0 (±0.01), got 0.8",
    ]);
});

test("validateAssessmentRequest: shares within tolerance are rescaled to 1.0", () => {
    const request = validateAssessmentRequest({ ...validBody, material_composition: { cotton: 0.6, polyester: 0.395 } });
    const total = [...request.composition.values()].reduce((sum, share) => sum + share, 0);
    assert.ok(Math.abs(total - 1) < 1e-12, `got ${total}`);
    assert.ok((request.composition.get("cotton") ?? 0) > 0.6);
});

test("validateAssessmentRequest: non-positive weight is rejected", () => {
    assert.deepEqual(issuesOf({ ...validBody, weight_kg: 0 }), ["weight_kg: must be greater than 0"]);
    assert.deepEqual(issuesOf({ ...validBody, weight_kg: -2 }), ["weight_kg: must be greater than 0"]);
});

test("validateAssessmentRequest: empty product name is rejected", () => {
    assert.deepEqual(issuesOf({ ...validBody, product_name: "   " }), ["product_name: must not be empty"]);
});

test("validateAssessmentRequest: share bounds", () => {
    assert.deepEqual(issuesOf({ ...validBody, material_composition: { cotton: 0, polyester: 1 } }), [
        "material_composition.cotton: share must be greater than 0",
    ]);
    assert.deepEqual(issuesOf({ ...validBody, material_composition: { cotton: 1.5 } }), [
        "material_composition.cotton: share must be at most 1",
    ]);
    assert.deepEqual(issuesOf({ ...validBody, material_composition: {} }), [
        "material_composition: must contain at least one material",
    ]);
});

test("validateAssessmentRequest: duplicate keys after normalization", () => {
    assert.deepEqual(issuesOf({ ...validBody, material_composition: { Cotton: 0.5, cotton: 0.5 } }), [
        'material_composition: duplicate material "cotton" after normalization',
    ]);
});

test("validateAssessmentRequest: unknown shipping mode and wrong shapes", () => {
    const [modeIssue] = issuesOf({ ...validBody, shipping_mode: "teleport" });
    assert.match(modeIssue ?? "", /^shipping_mode: /);

    assert.throws(() => validateAssessmentRequest(null), ValidationError);
    assert.throws(() => validateAssessmentRequest({ ...validBody, weight_kg: "heavy" }), ValidationError);
    assert.equal(issuesOf({}).length, 5);
});

test("ValidationError carries every issue in its message", () => {
    const error = new ValidationError(["a: x", "b: y"]);
    assert.equal(error.name, "ValidationError");
    assert.equal(error.code, "VALIDATION_ERROR");
    assert.equal(error.message, "Invalid assessment request: a: x; b: y");
});

test("validateAssessmentRequest: weight above the upper bound is rejected", () => {
    assert.deepEqual(issuesOf({ ...validBody, weight_kg: 1e306 }), ["weight_kg: must be at most 1000000"]);
    assert.equal(validateAssessmentRequest({ ...validBody, weight_kg: 1_000_000 }).weightKg, 1_000_000);
});

test("validateAssessmentRequest: composition exposes no mutators", () => {
    const request = validateAssessmentRequest({ ...validBody, material_composition: { cotton: 0.5, wool: 0.5 } });
    assert.equal(Object.isFrozen(request.composition), true);
    assert.equal("set" in request.composition, false);
    assert.equal("delete" in request.composition, false);
    assert.equal("clear" in request.composition, false);
    assert.equal(request.composition.size, 2);

    const seen: string[] = [];
    request.composition.forEach((share, key) => seen.push(`${key}=${share}`));
    assert.deepEqual(seen, ["cotton=0.5", "wool=0.5"]);
});
