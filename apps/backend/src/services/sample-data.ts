import type { ImageStyle } from "../constants/styles.js";
import { logger } from "../observability/logger.js";
import type { GenerationClient } from "./generation-client.js";
import type { RecordStore } from "./record-store.js";

export const samplePrompts: ReadonlyArray<{ prompt: string; style: ImageStyle }> = [
  { prompt: "a fantasy castle in the clouds", style: "realistic" },
  { prompt: "a futuristic robot chef in a kitchen", style: "cyberpunk" },
  { prompt: "a panda riding a bicycle in space", style: "cartoon" }
];

export const sampleFeedback = [
  "Great image, matches my expectation",
  "Nice style, but could use more detail",
  "Colors are perfect, composition is good"
];

const pick = <T>(items: readonly T[], random: () => number) => items[Math.floor(random() * items.length)];

/**
 * Fills an empty store with a few evaluated placeholder generations.
 * Returns the ids created, or an empty list when the store already has data.
 */
export const seedSampleData = async ({
  store,
  client,
  random = Math.random
}: {
  store: Pick<RecordStore, "count" | "create" | "updateEvaluation">;
  client: GenerationClient;
  random?: () => number;
}) => {
  if (store.count() > 0) return [];

  const created: number[] = [];
  for (const sample of samplePrompts) {
    const image = await client.generate(sample.prompt, sample.style);
    const recordId = await store.create(sample.prompt, sample.style, image);
    const score = 6 + Math.floor(random() * 4);
    store.updateEvaluation(recordId, score, pick(sampleFeedback, random));
    created.push(recordId);
  }

  logger.info("sample_data_seeded", { recordIds: created });
  return created;
};
