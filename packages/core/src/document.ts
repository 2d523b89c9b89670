// Source documents as they flow through the indexing pipeline
// - `transient` carries raw bytes and a content-type hint next to a document
// - it never reaches the vector store

export type DocumentMetadata = Record<string, unknown>;

export type SourceDocument = {
  content: string;
  metadata: DocumentMetadata;
};

export type TransientFields = {
  contentBytes?: Uint8Array;
  contentType?: string;
};

export type PipelineDocument = SourceDocument & {
  transient?: TransientFields;
};

// Well-known metadata keys
export const MetadataKeys = {
  id: "id",
  updatedOn: "updated_on",
  commitHash: "commit_hash",
  filename: "filename",
  collection: "collection",
  chunkId: "chunk_id",
  parentId: "parent_id",
  dependentDocs: "dependent_docs",
  // set to "index_meta" on the per-collection bookkeeping row
  type: "type",
  // Legacy loaders put raw payloads into metadata under these keys
  legacyContentBytes: "loader_content",
  legacyContentType: "loader_content_type",
} as const;

export function metadataString(metadata: DocumentMetadata, key: string): string | undefined {
  const value = metadata[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function toBytes(value: unknown): Uint8Array | undefined {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return Buffer.from(value, "utf8");
  return undefined;
}

// Moves legacy payload keys out of metadata into the transient side channel.
export function liftTransientFields(doc: PipelineDocument): PipelineDocument {
  const { legacyContentBytes, legacyContentType } = MetadataKeys;
  if (!(legacyContentBytes in doc.metadata) && !(legacyContentType in doc.metadata)) return doc;

  const metadata = { ...doc.metadata };
  const bytes = toBytes(metadata[legacyContentBytes]);
  const contentType = metadataString(metadata, legacyContentType);
  delete metadata[legacyContentBytes];
  delete metadata[legacyContentType];

  const transient: TransientFields = { ...doc.transient };
  if (bytes !== undefined && transient.contentBytes === undefined) transient.contentBytes = bytes;
  if (contentType !== undefined && transient.contentType === undefined) {
    transient.contentType = contentType;
  }

  return { content: doc.content, metadata, transient };
}

export async function* liftTransientFieldsStream(
  documents: AsyncIterable<PipelineDocument>,
): AsyncGenerator<PipelineDocument> {
  for await (const doc of documents) {
    yield liftTransientFields(doc);
  }
}

// Drops the side channel and any legacy payload keys.
export function toSourceDocument(doc: PipelineDocument): SourceDocument {
  const metadata = { ...doc.metadata };
  delete metadata[MetadataKeys.legacyContentBytes];
  delete metadata[MetadataKeys.legacyContentType];
  return { content: doc.content, metadata };
}
