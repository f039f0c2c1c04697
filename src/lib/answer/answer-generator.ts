import OpenAI from "openai";
import { renderContextBlocks } from "@/lib/search/citation";
import type { ContextPayload } from "@/types/retrieval";

export type AnswerInput = {
  question: string;
  context: ContextPayload;
  signal?: AbortSignal;
};

/** Composes prose from assembled context. The core never inspects the output. */
export interface AnswerGenerator {
  generate(input: AnswerInput): Promise<string>;
}

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I couldn't find enough information about that in the channel's videos to answer it.";

const SYSTEM_PROMPT = [
  "You answer questions about a YouTube channel using only the numbered transcript excerpts provided.",
  "Cite excerpts inline as [n]. If the excerpts do not answer the question, say so plainly.",
].join(" ");

export type OpenAIAnswerGeneratorOptions = {
  apiKey: string;
  model: string;
  temperature?: number;
  client?: OpenAI;
};

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIAnswerGeneratorOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async generate(input: AnswerInput): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: this.options.temperature ?? 0.2,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: `Excerpts:\n\n${renderContextBlocks(input.context)}\n\nQuestion: ${input.question}`,
          },
        ],
      },
      { signal: input.signal },
    );

    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
