/**
 * Capability surface of the hosted document index and grounded-answering
 * engine. Implementations never retry; every failure is a `GatewayError`.
 */

export interface CallOptions {
  /** Upper bound for the whole call, including pagination. */
  timeoutMs?: number;
}

export interface RemoteDocumentListing {
  documentIds: string[];
  /** More documents exist remotely than the listing cap allowed. */
  truncated: boolean;
}

export interface GroundedAnswer {
  text: string;
}

export interface IndexGateway {
  createIndex(name: string, options?: CallOptions): Promise<string>;

  /**
   * Uploads the bytes, then registers the upload with the index. When the
   * registration fails the upload stays behind; the error's details carry
   * its id as `orphanedDocumentId`.
   */
  addDocument(
    remoteIndexId: string,
    bytes: Uint8Array,
    filename: string,
    options?: CallOptions,
  ): Promise<string>;

  /** Detaches the document from the index. The upload itself is kept. */
  removeDocument(
    remoteIndexId: string,
    remoteDocumentId: string,
    options?: CallOptions,
  ): Promise<void>;

  listDocuments(
    remoteIndexId: string,
    options?: CallOptions,
  ): Promise<RemoteDocumentListing>;

  /** Answers with retrieval scoped to exactly `remoteIndexId`. */
  answer(
    remoteIndexId: string,
    systemInstructions: string,
    userMessage: string,
    options?: CallOptions,
  ): Promise<GroundedAnswer>;
}
