import { createImpactEngine } from "@ecoscore/impact-core";

export async function methodologyCommand() {
  const methodology = createImpactEngine().methodology();
  console.log(JSON.stringify(methodology, null, 2));
  return methodology;
}
