import { strict as assert } from "node:assert";
import test from "node:test";
import { FakeListChatModel } from "@langchain/core/utils/testing";

import { CharacterSheetGenerator } from "../src/characterSheetGenerator";
import { InMemoryObjectStore } from "./support/fakes";

test("stores the model output verbatim as JSON", async () => {
  const sheet = "{\"bolt\": {\"physical_appearance\": \"dented copper shell\"}}";
  const store = new InMemoryObjectStore();
  const generator = new CharacterSheetGenerator(new FakeListChatModel({ responses: [sheet] }), store);

  const result = await generator.generate("Describe Bolt.", "intermediate_assets/character_descriptions.json");

  assert.equal(result, sheet);
  assert.deepEqual(store.objects.get("intermediate_assets/character_descriptions.json"), {
    data: sheet,
    contentType: "application/json"
  });
});

test("malformed output is passed through untouched", async () => {
  const store = new InMemoryObjectStore();
  const generator = new CharacterSheetGenerator(new FakeListChatModel({ responses: ["{\"bolt\": "] }), store);

  await generator.generate("Describe Bolt.", "sheet.json");

  assert.equal(store.objects.get("sheet.json")?.data, "{\"bolt\": ");
});
