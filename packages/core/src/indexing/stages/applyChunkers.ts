import {
  chunkTextDocument,
  processDocumentByType,
  type ChunkingContext,
} from "../../chunking/processDocument.js";
import { DEFAULT_EXTENSION, fileExtensionByChunker } from "../../chunking/registry.js";
import {
  MetadataKeys,
  metadataString,
  toSourceDocument,
  type PipelineDocument,
} from "../../document.js";
import { warnLine } from "../../logging.js";

export type ApplyChunkersOptions = ChunkingContext & {
  chunkingTool?: string;
};

// Priority:
// 1. a content-type hint parses the byte payload by type
// 2. a chunking tool with a byte payload parses it as the tool's format
// 3. a chunking tool alone chunks the text content
// 4. otherwise the document passes through
export async function* applyChunkersStage(
  documents: AsyncIterable<PipelineDocument>,
  options: ApplyChunkersOptions,
): AsyncGenerator<PipelineDocument> {
  const { chunkingTool, logger } = options;

  for await (const doc of documents) {
    const transient = doc.transient;
    const source = toSourceDocument(doc);
    const docId = metadataString(doc.metadata, MetadataKeys.id) ?? "<unknown>";

    if (transient?.contentType) {
      let bytes = transient.contentBytes;
      if (bytes === undefined) {
        warnLine(
          logger,
          `Document '${docId}' has content type ${transient.contentType} but no byte payload; chunking its text`,
        );
        bytes = new TextEncoder().encode(doc.content);
      }
      yield* processDocumentByType(source, bytes, transient.contentType, options);
      continue;
    }

    if (chunkingTool && transient?.contentBytes !== undefined) {
      if (transient.contentBytes.length === 0) {
        yield source;
        continue;
      }
      const extension = fileExtensionByChunker(chunkingTool) ?? DEFAULT_EXTENSION;
      yield* processDocumentByType(source, transient.contentBytes, extension, options);
      continue;
    }

    if (chunkingTool) {
      const chunks = chunkTextDocument(source, chunkingTool, options);
      if (!chunks) {
        warnLine(logger, `Unknown chunking tool '${chunkingTool}', document '${docId}' is kept whole`);
        yield source;
        continue;
      }
      yield* chunks;
      continue;
    }

    yield doc;
  }
}
