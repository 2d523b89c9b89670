export * from "./document.js";
export * from "./errors.js";
export * from "./env.js";
export * from "./logging.js";

export * from "./vectorstore/types.js";
export * from "./vectorstore/filter.js";
export * from "./vectorstore/indexedData.js";
export * from "./vectorstore/baseAdapter.js";
export * from "./vectorstore/sqliteAdapter.js";
export * from "./vectorstore/localStore.js";
export * from "./vectorstore/localAdapter.js";
export * from "./vectorstore/registry.js";

export * from "./db/db.js";

export * from "./chunking/types.js";
export * from "./chunking/options.js";
export * from "./chunking/registry.js";
export * from "./chunking/processDocument.js";

export * from "./indexing/types.js";
export * from "./indexing/dedupStrategies.js";
export * from "./indexing/indexData.js";
export * from "./indexing/indexMeta.js";

export * from "./search/types.js";
export * from "./search/rerank.js";
export * from "./search/searchIndex.js";

export * from "./toolkit/schemas.js";
export * from "./toolkit/indexerToolkit.js";

export * from "./sources/directory.js";
