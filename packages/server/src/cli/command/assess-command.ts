import { parseArgs } from "node:util";
import process from "node:process";
import { createImpactEngine, SHIPPING_MODES, type AssessImpactBody, type ImpactResult } from "@ecoscore/impact-core";
import { createLogger } from "../../logging/logger.js";
import { extractVerbosity, parseMaterialFlags, parsePositiveNumberFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export interface AssessArgs {
  body: AssessImpactBody;
  json: boolean;
  verbosity: number;
}

function required(name: string, value: string | undefined): string {
  if (value === undefined || value.trim() === "") {
    throw new Error(`${name} is required`);
  }
  return value;
}

/** Returns null when --help was requested. */
export function parseAssessArgs(argv: string[]): AssessArgs | null {
  const { level, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },

      product: { type: "string" },
      material: { type: "string", multiple: true },
      weight: { type: "string" },

      origin: { type: "string" },
      destination: { type: "string" },
      mode: { type: "string" },

      json: { type: "boolean" },
    },
    allowPositionals: false,
  });

  if (values.help) return null;

  const shippingMode = SHIPPING_MODES.find((mode) => mode === values.mode);
  if (values.mode !== undefined && shippingMode === undefined) {
    throw new Error(`--mode must be one of ${SHIPPING_MODES.join(", ")}`);
  }

  return {
    body: {
      product_name: required("--product", values.product),
      material_composition: parseMaterialFlags(values.material),
      weight_kg: parsePositiveNumberFromCommand("--weight", required("--weight", values.weight), 0),
      origin_country: required("--origin", values.origin),
      destination_country: required("--destination", values.destination),
      shipping_mode: shippingMode ?? "sea",
    },
    json: !!values.json,
    verbosity: level,
  };
}

function formatScore(score: number): string {
  return score.toFixed(2);
}

export function printImpactResult(result: ImpactResult, body: AssessImpactBody, verbose: boolean) {
  console.log("==============================");
  console.log("\nProduct Impact Assessment (indicative)");
  console.log("\n--------------------------\n");
  console.log(`Product: ${result.product_name}`);
  console.log(`Route: ${body.origin_country} -> ${body.destination_country} (${result.logistics_tier}, ${body.shipping_mode ?? "sea"})`);
  console.log(`Weight: ${body.weight_kg} kg`);
  console.log("\n----------SCORES----------\n");
  console.log(`Total sustainability score: ${formatScore(result.total_sustainability_score)} / 100`);
  console.log(`Material score: ${formatScore(result.breakdown.material_score)}`);
  console.log(`Logistics score: ${formatScore(result.breakdown.logistics_score)}`);
  console.log(`Weight impact: ${formatScore(result.breakdown.weight_impact)}`);
  console.log("\n----------IMPACT----------\n");
  console.log(`CO2 estimate: ${result.co2_estimate_kg.toFixed(2)} kg CO2e`);
  console.log(`Water usage: ${result.water_usage_liters.toFixed(2)} L`);
  console.log(`CBAM relevant: ${result.cbam_relevant ? "yes" : "no"}`);
  if (verbose) {
    console.log(`CBAM: ${result.cbam_reason}`);
    console.log("\n----------NOTES-----------\n");
    for (const note of result.explanation) {
      console.log(`- ${note}`);
    }
  }
  console.log("\n--------------------------\n");
  console.log(result.limitations);
  console.log(`ecoscore methodology v.${result.methodology_version}`);
}

export async function assessCommand(argv = process.argv.slice(2)): Promise<ImpactResult | undefined> {
  const args = parseAssessArgs(argv);
  if (!args) {
    printHelp();
    return undefined;
  }

  // debug logs go to stderr so --json output stays parseable
  const logger = createLogger({
    level: args.verbosity >= 2 ? "debug" : "silent",
    destination: process.stderr,
  });
  const engine = createImpactEngine({ logger });

  const result = engine.assess(args.body);

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  printImpactResult(result, args.body, args.verbosity >= 1);
  return result;
}
