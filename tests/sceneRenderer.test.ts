import { strict as assert } from "node:assert";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import test from "node:test";

import { GenerationIncompleteError, RemoteProcessingError } from "../src/errors";
import { SceneRenderer } from "../src/sceneRenderer";
import { FakeRenderBackend, tempDir, testConfig } from "./support/fakes";

function rendererFor(backend: FakeRenderBackend) {
  const config = testConfig();
  return new SceneRenderer(backend, {
    textModel: config.models.renderText,
    imageModel: config.models.renderImage,
    render: config.render,
    polling: config.polling.render
  });
}

test("text-only rendering polls to completion and writes the clip", async () => {
  const dir = await tempDir("render");
  const backend = new FakeRenderBackend({ pendingPolls: 2 });
  const output = join(dir, "scene_1.mp4");

  const scene = await rendererFor(backend).renderFromText(0, "A lighthouse at dawn", output);

  assert.deepEqual(scene, { index: 0, path: output, durationSeconds: 8 });
  assert.equal(await readFile(output, "utf-8"), "video for: A lighthouse at dawn");
  assert.deepEqual(backend.submitted, [
    {
      model: "veo-3.0-fast-generate-001",
      prompt: "A lighthouse at dawn",
      conditioningImagePath: undefined,
      conditioningImage: undefined
    }
  ]);
});

test("image-conditioned rendering attaches the still and uses the image model", async () => {
  const dir = await tempDir("render");
  const frame = join(dir, "last_frame.png");
  await writeFile(frame, "frame of scene_1.mp4");

  const backend = new FakeRenderBackend();
  await rendererFor(backend).renderFromImage(1, "The robot waves", frame, join(dir, "scene_2.mp4"));

  assert.deepEqual(backend.submitted, [
    {
      model: "veo-3.0-generate-preview",
      prompt: "The robot waves",
      conditioningImagePath: frame,
      conditioningImage: "frame of scene_1.mp4"
    }
  ]);
});

test("a completed operation without a video is a GenerationIncompleteError", async () => {
  const dir = await tempDir("render");
  const backend = new FakeRenderBackend({ emptyAt: 0 });

  await assert.rejects(
    rendererFor(backend).renderFromText(0, "Empty", join(dir, "scene_1.mp4")),
    GenerationIncompleteError
  );
});

test("a failed operation propagates the remote error", async () => {
  const dir = await tempDir("render");
  const backend = new FakeRenderBackend({ failAt: 0 });

  await assert.rejects(
    rendererFor(backend).renderFromText(0, "Filtered", join(dir, "scene_1.mp4")),
    RemoteProcessingError
  );
});
