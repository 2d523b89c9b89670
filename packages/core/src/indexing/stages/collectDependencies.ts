import {
  liftTransientFields,
  MetadataKeys,
  metadataString,
  type PipelineDocument,
} from "../../document.js";
import { errorMessage } from "../../errors.js";
import { warnLine, type IndexLogger } from "../../logging.js";
import type { Loader } from "../types.js";

// Yields each document, then its dependents tagged with `parent_id`.
export async function* collectDependenciesStage(
  documents: AsyncIterable<PipelineDocument>,
  loader: Loader,
  logger?: IndexLogger,
): AsyncGenerator<PipelineDocument> {
  for await (const doc of documents) {
    yield doc;
    if (!loader.processDocument) continue;

    const parentId = doc.metadata[MetadataKeys.id];
    try {
      for await (const dependent of await loader.processDocument(doc)) {
        const lifted = liftTransientFields(dependent);
        yield { ...lifted, metadata: { ...lifted.metadata, [MetadataKeys.parentId]: parentId } };
      }
    } catch (error) {
      const label = metadataString(doc.metadata, MetadataKeys.id) ?? "<unknown>";
      warnLine(logger, `Failed to collect dependencies of '${label}': ${errorMessage(error)}`);
    }
  }
}
