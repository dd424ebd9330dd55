export type OwnerId = string;

/** Assigned by the document store; lexical order equals creation order. */
export type DocumentId = string;

/** `<documentId>:<index>` */
export type ChunkId = string;

export type ChunkingParams = {
  targetSize: number;
  overlap: number;
};

export type Document = {
  id: DocumentId;
  ownerId: OwnerId;
  title: string;
  /** SHA-256 hex of the UTF-8 bytes of the ingested text */
  fingerprint: string;
  chunkCount: number;
  chunking: ChunkingParams;
  /** ISO date string */
  createdAt: string;
};

export type Chunk = {
  id: ChunkId;
  documentId: DocumentId;
  ownerId: OwnerId;
  /** 0-based, contiguous within the document */
  index: number;
  text: string;
  /** Offsets of `text` in the source document */
  start: number;
  end: number;
  /** SHA-256 hex of `text` */
  fingerprint: string;
  targetSize: number;
  overlap: number;
};

export function chunkIdFor(documentId: DocumentId, index: number): ChunkId {
  return `${documentId}:${index}`;
}

/**
 * Document order used for deterministic tie-breaking: lower document id
 * first, then lower chunk index.
 */
export function compareDocumentOrder(
  a: { documentId: DocumentId; chunkIndex: number },
  b: { documentId: DocumentId; chunkIndex: number }
): number {
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  return a.chunkIndex - b.chunkIndex;
}
