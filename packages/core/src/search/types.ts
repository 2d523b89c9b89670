import type { DocumentMetadata } from "../document.js";
import type { MetadataFilter } from "../vectorstore/filter.js";

export type SearchHit = {
  content: string;
  metadata: DocumentMetadata;
  score: number;
};

export type RerankRules = {
  contains?: string;
  priority?: string | number | boolean;
  sort?: "asc" | "desc";
};

export type RerankFieldConfig = {
  weight?: number;
  rules?: RerankRules;
};

// Keyed by metadata field
export type RerankingConfig = Record<string, RerankFieldConfig>;

export type SearchIndexParams = {
  query: string;
  collectionSuffix?: string;
  filter?: MetadataFilter | string;
  cutOff?: number;
  searchTop?: number;
  rerankingConfig?: RerankingConfig;
};

export type ChatMessage = {
  role: string;
  content: string;
};

export type StepbackSearchParams = SearchIndexParams & {
  messages?: ChatMessage[];
};

// Text-completion capability used for query rewriting and answers
export type CompleteText = (prompt: string) => Promise<string>;
