import { RunnableLambda } from "@langchain/core/runnables";
import type { BaseMessage, MessageContent } from "@langchain/core/messages";
import { ParseError, errorMessage } from "../errors";

/**
 * A custom Runnable to extract pure JSON from an LLM response, ignoring any
 * text before or after the JSON block. This handles `content` that might be
 * string or array.
 */
export const extractJsonRunnable = new RunnableLambda<BaseMessage, string>({
  func: async (input: BaseMessage): Promise<string> =>
    extractJsonBlock(extractStringFromMessageContent(input.content)),
});

/**
 * Returns the substring from the first `[` or `{` to the last `]` or `}`.
 */
export function extractJsonBlock(text: string): string {
  const jsonMatch = text.match(/(\[[\s\S]*\]|\{[\s\S]*\})/);
  if (!jsonMatch) {
    throw new ParseError("No JSON found in the LLM response.");
  }
  return jsonMatch[0];
}

/**
 * Safely extract a string from message content, which might be a string or an
 * array of content parts.
 */
export function extractStringFromMessageContent(inputContent: MessageContent): string {
  if (typeof inputContent === "string") {
    return inputContent;
  }

  return inputContent
    .map((part) => {
      if (part.type === "text" && "text" in part && typeof part.text === "string") {
        return part.text;
      }
      return JSON.stringify(part);
    })
    .join("\n");
}

/**
 * `JSON.parse` that reports failures as `ParseError`.
 */
export function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`${what} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
