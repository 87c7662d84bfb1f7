import { strict as assert } from "node:assert";
import test from "node:test";
import { FakeListChatModel } from "@langchain/core/utils/testing";

import { ParseError, PipelineError } from "../src/errors";
import { PromptSynthesizer, classifyPromptItem, promptFileName } from "../src/promptSynthesizer";
import { InMemoryObjectStore } from "./support/fakes";

const SCENES_KEY = "intermediate_assets/chunk_analysis.json";
const CHARACTERS_KEY = "intermediate_assets/character_descriptions.json";

async function setup(response: string, documents: { scenes?: string; characters?: string } = {}) {
  const store = new InMemoryObjectStore();
  await store.writeText(
    SCENES_KEY,
    documents.scenes ?? JSON.stringify([{ scene_number: 1 }, { scene_number: 2 }]),
    "application/json"
  );
  await store.writeText(
    CHARACTERS_KEY,
    documents.characters ?? JSON.stringify({ captain_mira: { voice_style: "gravelly" } }),
    "application/json"
  );
  const llm = new FakeListChatModel({ responses: [response] });
  const synthesizer = new PromptSynthesizer(llm, store, {
    artStyle: "Paper cut-out style",
    shotDurationSeconds: 8,
    promptPrefix: "final_prompts/"
  });
  return { store, synthesizer };
}

function promptFiles(store: InMemoryObjectStore): [string, string][] {
  return store.keysUnder("final_prompts/").map((key) => [key, store.objects.get(key)?.data ?? ""]);
}

test("promptFileName pads to three digits", () => {
  assert.equal(promptFileName(1), "001_chunk_prompt.txt");
  assert.equal(promptFileName(42), "042_chunk_prompt.txt");
  assert.equal(promptFileName(120), "120_chunk_prompt.txt");
});

test("classifyPromptItem tags each element shape", () => {
  assert.deepEqual(classifyPromptItem({ veo_prompt: "A wide shot" }), { kind: "structured", text: "A wide shot" });
  assert.deepEqual(classifyPromptItem("A wide shot"), { kind: "raw", text: "A wide shot" });
  assert.equal(classifyPromptItem({ veo_prompt: "" }).kind, "unrecognized");
  assert.equal(classifyPromptItem({ veo_prompt: 7 }).kind, "unrecognized");
  assert.equal(classifyPromptItem({ prompt: "x" }).kind, "unrecognized");
  assert.deepEqual(classifyPromptItem(""), { kind: "unrecognized", reason: "empty string" });
  assert.deepEqual(classifyPromptItem(42), { kind: "unrecognized", reason: "unexpected number" });
  assert.deepEqual(classifyPromptItem(null), { kind: "unrecognized", reason: "unexpected object" });
});

test("structured and bare-string arrays produce identical prompt files", async () => {
  const structured = await setup(JSON.stringify([{ veo_prompt: "Scene one" }, { veo_prompt: "Scene two" }]));
  const raw = await setup(JSON.stringify(["Scene one", "Scene two"]));

  const structuredKeys = await structured.synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY);
  const rawKeys = await raw.synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY);

  assert.deepEqual(structuredKeys, ["final_prompts/001_chunk_prompt.txt", "final_prompts/002_chunk_prompt.txt"]);
  assert.deepEqual(rawKeys, structuredKeys);
  assert.deepEqual(promptFiles(structured.store), [
    ["final_prompts/001_chunk_prompt.txt", "Scene one"],
    ["final_prompts/002_chunk_prompt.txt", "Scene two"]
  ]);
  assert.deepEqual(promptFiles(raw.store), promptFiles(structured.store));
});

test("unusable elements are skipped and keep their position in the numbering", async () => {
  const items = [{ veo_prompt: "first" }, 42, "third", { other: "x" }, { veo_prompt: "" }, "sixth"];
  const { store, synthesizer } = await setup(`Here are the prompts:\n${JSON.stringify(items)}\nEnjoy!`);

  const keys = await synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY);

  assert.equal(keys.length, items.length - 3);
  assert.deepEqual(promptFiles(store), [
    ["final_prompts/001_chunk_prompt.txt", "first"],
    ["final_prompts/003_chunk_prompt.txt", "third"],
    ["final_prompts/006_chunk_prompt.txt", "sixth"]
  ]);
});

test("a response without JSON is a ParseError", async () => {
  const { store, synthesizer } = await setup("I cannot help with that.");

  await assert.rejects(synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY), ParseError);
  assert.deepEqual(promptFiles(store), []);
});

test("a top-level object or broken JSON is a ParseError", () => {
  assert.throws(() => PromptSynthesizer.parseCandidates("{\"veo_prompt\": \"x\"}"), ParseError);
  assert.throws(() => PromptSynthesizer.parseCandidates("[not json]"), ParseError);
});

test("zero usable prompts fails the step without uploading anything", async () => {
  const { store, synthesizer } = await setup(JSON.stringify([7, { title: "no prompt" }]));

  await assert.rejects(synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY), (error) => {
    assert.ok(error instanceof PipelineError);
    assert.equal(error instanceof ParseError, false);
    return true;
  });
  assert.deepEqual(promptFiles(store), []);
});

test("a malformed character sheet surfaces as a ParseError during synthesis", async () => {
  const { store, synthesizer } = await setup(JSON.stringify(["unused"]), { characters: "{\"captain_mira\": " });

  await assert.rejects(synthesizer.synthesize(SCENES_KEY, CHARACTERS_KEY), ParseError);
  assert.deepEqual(promptFiles(store), []);
});
