import { toSourceDocument, type PipelineDocument, type SourceDocument } from "../../document.js";
import { appendCollectionTag } from "../../vectorstore/indexedData.js";

// Materializes the stream: drops the transient side channel and tags the collection.
export async function cleanMetadataStage(
  documents: AsyncIterable<PipelineDocument>,
  collectionSuffix: string,
): Promise<SourceDocument[]> {
  const out: SourceDocument[] = [];
  for await (const doc of documents) {
    const source = toSourceDocument(doc);
    out.push({
      content: source.content,
      metadata: appendCollectionTag(source.metadata, collectionSuffix),
    });
  }
  return out;
}
