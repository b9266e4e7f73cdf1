import type { DocumentFetcher } from "../DocumentFetcher";

/** Serves documents from a map keyed by absolute URL. */
export class InMemoryDocumentFetcher implements DocumentFetcher {
  readonly requested: string[] = [];
  private readonly documents: Map<string, string>;

  constructor(documents: Record<string, string>) {
    this.documents = new Map(Object.entries(documents));
  }

  async fetchText(location: URL): Promise<string> {
    this.requested.push(location.href);
    const content = this.documents.get(location.href);
    if (content === undefined) {
      throw new Error(`Not found: ${location.href}`);
    }
    return content;
  }
}
