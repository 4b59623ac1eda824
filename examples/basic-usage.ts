/**
 * Basic Usage Example
 *
 * Demonstrates folding facts into an entity map, reading it through an
 * index and a typed aggregate, and updating it.
 * Run with: npm run example
 */

import { z } from "zod";
import { EntityMap, type TypedAggregate } from "@factmap/sdk";

const Person = z.object({
  handle: z.string(),
  nicknames: z.set(z.string()).default(() => new Set<string>()),
  age: z.number().optional(),
});

type Person = z.infer<typeof Person>;

const person: TypedAggregate<Person> = {
  kind: "typed",
  schema: Person,
  rename: { identifier: "handle", name: "nicknames" },
};

function main() {
  // Fold a batch of facts
  console.log("📥 Folding facts...");
  const map = EntityMap.fromFacts(
    [
      { entity: 0, attribute: "identifier", value: "bill", added: true },
      { entity: 0, attribute: "name", value: "Bill", added: true },
      { entity: 0, attribute: "age", value: 32, added: true },
      { entity: 0, attribute: "name", value: "Billy", added: true },
      { entity: 1, attribute: "identifier", value: "ann", added: true },
      { entity: 1, attribute: "name", value: "Ann", added: true },
    ],
    { cardinalityMany: "name", indexBy: "identifier" }
  );
  console.log(`✅ ${map.size} entities`);
  console.log("   bill:", map.get("bill"));

  // Retract one nickname
  console.log("\n✂️  Retracting a nickname...");
  const trimmed = map.update([{ entity: 0, attribute: "name", value: "Billy", added: false }]);
  console.log("   bill:", trimmed.get("bill"));

  // Typed view keyed by handle
  console.log("\n🧩 Typed view...");
  const people = trimmed.aggregateBy(person, "handle");
  for (const [handle, value] of people) {
    console.log(`   ${String(handle)}: ${[...value.nicknames].join(", ")} (${value.age ?? "age unknown"})`);
  }

  // Write through the typed vocabulary
  console.log("\n✏️  Setting Ann's age...");
  const result = people.putAttribute("ann", "age", 29);
  if (result.ok) {
    console.log(`✅ ann is ${result.map.getAttribute("ann", "age")}`);
  } else {
    console.log(`❌ ${result.error.message}`);
  }

  // Replace a whole record
  console.log("\n🔁 Replacing from a record...");
  const replaced = people.updateFromRecords([{ identifier: "ann", name: ["Annie"] }], "identifier");
  console.log("   ann:", replaced.get("ann"));
  console.log("   raw entities:", [...replaced.rawData.keys()]);

  console.log("\n📊 Stats:", replaced.stats());
}

main();
