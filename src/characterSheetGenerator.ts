import { ChatPromptTemplate } from "@langchain/core/prompts";
import { RunnableSequence } from "@langchain/core/runnables";
import { StringOutputParser } from "@langchain/core/output_parsers";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { logMessage } from "./logger/logger";
import type { ObjectStore } from "./storage/objectStore";

/**
 * Produces the character sheet shared by every scene prompt.
 *
 * The chat model is expected to run in JSON mode. Its output is stored as-is;
 * malformed JSON only surfaces once the synthesizer reads it back.
 */
export class CharacterSheetGenerator {
  private chain: RunnableSequence<{ brief: string }, string>;

  constructor(llm: BaseChatModel, private store: ObjectStore) {
    this.chain = RunnableSequence.from([
      ChatPromptTemplate.fromTemplate(`{brief}

Respond with a single JSON object only.`),
      llm,
      new StringOutputParser(),
    ]);
  }

  async generate(brief: string, outputKey: string): Promise<string> {
    const sheet = await this.chain.invoke({ brief });
    await this.store.writeText(outputKey, sheet, "application/json");

    logMessage({
      step: "generateCharacters",
      level: "info",
      message: `Character sheet saved to gs://${this.store.bucketName}/${outputKey}`,
    });
    return sheet;
  }
}
