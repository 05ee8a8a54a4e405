import type { DocumentContext } from './registry.js';

/** In-memory document bindings, created on first use and dropped when the editor closes the document. */
export class DocumentStore {
  private contexts = new Map<string, DocumentContext>();

  getOrCreate(documentId: string, currentPath: string): DocumentContext {
    const existing = this.contexts.get(documentId);
    if (existing) {
      existing.currentPath = currentPath;
      return existing;
    }
    const ctx: DocumentContext = { documentId, currentPath };
    this.contexts.set(documentId, ctx);
    return ctx;
  }

  get(documentId: string): DocumentContext | undefined {
    return this.contexts.get(documentId);
  }

  delete(documentId: string): boolean {
    return this.contexts.delete(documentId);
  }

  list(): DocumentContext[] {
    return [...this.contexts.values()];
  }
}
