import type { ChatMessage } from "./types.js";

function formatMessages(messages: ChatMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

export function stepbackPrompt(query: string, messages: ChatMessage[]): string {
  return [
    "Rewrite the question below as a more general question for similarity search.",
    "Drop filler and question words, but keep every name, date and acronym exactly as written.",
    "Reply with the rewritten question only.",
    "",
    "<conversation_history>",
    formatMessages(messages),
    "</conversation_history>",
    "",
    "<input>",
    query,
    "</input>",
  ].join("\n");
}

export function answerPrompt(query: string, searchResults: string, messages: ChatMessage[]): string {
  return [
    "<search_results>",
    searchResults,
    "</search_results>",
    "",
    "<conversation_history>",
    formatMessages(messages),
    "</conversation_history>",
    "",
    "Answer the question using only the search results above.",
    'If the results do not contain the answer, reply "I have no answer".',
    "",
    "<question>",
    query,
    "</question>",
    "",
    "## Answer",
    "",
    "## Score",
    "Rate the relevance of the answer from 0 to 100.",
    "",
    "## Citations",
    "- source (score)",
  ].join("\n");
}
