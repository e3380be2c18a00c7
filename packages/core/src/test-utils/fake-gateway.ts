/**
 * In-memory IndexGateway for service and route tests. Records every call and
 * lets a test queue failures per method or change the remote side out of band.
 */

import { GatewayError } from "../errors/catalog.js";
import type { IndexGateway } from "../gateway/types.js";

export type GatewayMethod = keyof IndexGateway;

export interface RecordedCall {
  method: GatewayMethod;
  args: unknown[];
}

export interface FakeIndexGateway extends IndexGateway {
  readonly calls: RecordedCall[];
  /** Remote document ids per index, in insertion order. */
  readonly indexes: Map<string, string[]>;
  countCalls(method: GatewayMethod): number;
  /** Makes the next call to `method` reject with `error`. */
  failNext(method: GatewayMethod, error: Error): void;
  /** Adds a document to an index without going through the catalog. */
  injectDocument(remoteIndexId: string, remoteDocumentId: string): void;
  answerText: string;
}

export interface FakeIndexGatewayOptions {
  answerText?: string;
  listCap?: number;
}

export function createFakeIndexGateway(
  options: FakeIndexGatewayOptions = {},
): FakeIndexGateway {
  const listCap = options.listCap ?? 200;
  const calls: RecordedCall[] = [];
  const indexes = new Map<string, string[]>();
  const failures = new Map<GatewayMethod, Error[]>();
  let indexSeq = 0;
  let documentSeq = 0;

  function record(method: GatewayMethod, args: unknown[]): void {
    calls.push({ method, args });
    const queued = failures.get(method);
    const next = queued?.shift();
    if (next) throw next;
  }

  function documentsOf(remoteIndexId: string, method: GatewayMethod): string[] {
    const docs = indexes.get(remoteIndexId);
    if (!docs) {
      throw new GatewayError("not_found", `${method} failed: unknown index ${remoteIndexId}`, {
        details: { operation: method },
      });
    }
    return docs;
  }

  const fake: FakeIndexGateway = {
    calls,
    indexes,
    answerText: options.answerText ?? "Answer from documents.",

    countCalls(method) {
      return calls.filter((c) => c.method === method).length;
    },

    failNext(method, error) {
      const queued = failures.get(method) ?? [];
      queued.push(error);
      failures.set(method, queued);
    },

    injectDocument(remoteIndexId, remoteDocumentId) {
      documentsOf(remoteIndexId, "addDocument").push(remoteDocumentId);
    },

    async createIndex(name) {
      record("createIndex", [name]);
      indexSeq += 1;
      const id = `idx-${indexSeq}`;
      indexes.set(id, []);
      return id;
    },

    async addDocument(remoteIndexId, bytes, filename) {
      record("addDocument", [remoteIndexId, bytes, filename]);
      const docs = documentsOf(remoteIndexId, "addDocument");
      documentSeq += 1;
      const id = `doc-${documentSeq}`;
      docs.push(id);
      return id;
    },

    async removeDocument(remoteIndexId, remoteDocumentId) {
      record("removeDocument", [remoteIndexId, remoteDocumentId]);
      const docs = documentsOf(remoteIndexId, "removeDocument");
      const at = docs.indexOf(remoteDocumentId);
      if (at === -1) {
        throw new GatewayError(
          "not_found",
          `removeDocument failed: unknown document ${remoteDocumentId}`,
          { details: { operation: "removeDocument" } },
        );
      }
      docs.splice(at, 1);
    },

    async listDocuments(remoteIndexId) {
      record("listDocuments", [remoteIndexId]);
      const docs = documentsOf(remoteIndexId, "listDocuments");
      return {
        documentIds: docs.slice(0, listCap),
        truncated: docs.length > listCap,
      };
    },

    async answer(remoteIndexId, systemInstructions, userMessage) {
      record("answer", [remoteIndexId, systemInstructions, userMessage]);
      documentsOf(remoteIndexId, "answer");
      return { text: fake.answerText };
    },
  };

  return fake;
}
