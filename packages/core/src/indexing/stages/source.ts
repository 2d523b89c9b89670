import type { PipelineDocument } from "../../document.js";
import type { DocumentSource } from "../types.js";

export async function* iterateDocuments(source: DocumentSource): AsyncGenerator<PipelineDocument> {
  for await (const doc of source) {
    yield doc;
  }
}
