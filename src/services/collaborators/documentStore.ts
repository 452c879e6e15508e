import fs from 'fs/promises';
import { z } from 'zod';
import { DocumentStore, RetrievedDocument, StoredDocument } from './types';

const documentsSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    content: z.string(),
    tags: z.array(z.string()).default([]),
  }),
);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 2);
}

/**
 * Keyword-overlap retrieval over a fixed corpus. Similarity is the share of
 * distinct query terms found in the document's title, tags and content.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents: Array<{ doc: StoredDocument; terms: Set<string> }>;

  constructor(documents: StoredDocument[]) {
    this.documents = documents.map((doc) => ({
      doc,
      terms: new Set(tokenize(`${doc.title} ${doc.tags.join(' ')} ${doc.content}`)),
    }));
  }

  static async fromFile(filePath: string): Promise<InMemoryDocumentStore> {
    const raw = await fs.readFile(filePath, 'utf8');
    return new InMemoryDocumentStore(documentsSchema.parse(JSON.parse(raw)));
  }

  get size(): number {
    return this.documents.length;
  }

  async retrieve(query: string, topK: number): Promise<RetrievedDocument[]> {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0 || topK <= 0) return [];

    return this.documents
      .map(({ doc, terms }) => ({
        ...doc,
        similarity: queryTerms.filter((term) => terms.has(term)).length / queryTerms.length,
      }))
      .filter((doc) => doc.similarity > 0)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);
  }
}
