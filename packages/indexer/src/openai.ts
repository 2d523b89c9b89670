// OpenAI-backed model capabilities
// - embeddings for indexing and search, chat completions for stepback prompts
// - clients are typed structurally so tests can pass in-process fakes

import type { CompleteText, EmbedTexts } from "@vecsync/core";

export type EmbeddingsClient = {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      encoding_format: "float";
    }): Promise<{ data: Array<{ embedding: unknown }> }>;
  };
};

export type ChatClient = {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "user"; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
};

export function embeddingDimForModel(model: string): number {
  if (model === "text-embedding-3-large") return 3072;
  return 1536;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

export function createOpenAiEmbedTexts(client: EmbeddingsClient, model: string): EmbedTexts {
  return async (inputs) => {
    if (inputs.length === 0) return [];

    const resp = await client.embeddings.create({ model, input: inputs, encoding_format: "float" });
    const data: unknown = resp.data;
    if (!Array.isArray(data)) {
      throw new Error("OpenAI embeddings.create returned no data array");
    }
    if (data.length !== inputs.length) {
      throw new Error(
        `OpenAI embeddings.create returned ${data.length} embeddings for ${inputs.length} inputs`,
      );
    }

    return resp.data.map((item, index) => {
      if (!isNumberArray(item.embedding)) {
        throw new Error(`OpenAI embeddings.create returned a non-numeric embedding at index ${index}`);
      }
      return item.embedding;
    });
  };
}

export function createOpenAiComplete(client: ChatClient, model: string): CompleteText {
  return async (prompt) => {
    const resp = await client.chat.completions.create({
      model,
      messages: [{ role: "user", content: prompt }],
    });
    const content = resp.choices[0]?.message.content;
    if (typeof content !== "string") {
      throw new Error("OpenAI chat.completions.create returned no message content");
    }
    return content.trim();
  };
}
