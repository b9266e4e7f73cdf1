import { ComponentRegistry } from "./openapi/ComponentRegistry";
import { DefaultDocumentFetcher, DocumentFetcher } from "./DocumentFetcher";

export interface ConversionOptions {
    fetcher?: DocumentFetcher;
    timeoutMs?: number;
}

/**
 * State owned by a single conversion run. Every loader and generator receives
 * it explicitly; nothing survives between runs.
 */
export interface ConversionContext {
    readonly fetcher: DocumentFetcher;
    readonly visitedDocuments: Set<string>;
    readonly visitedSchemas: Set<string>;
    readonly registry: ComponentRegistry;
}

export function createConversionContext(options: ConversionOptions = {}): ConversionContext {
    return {
        fetcher: options.fetcher ?? new DefaultDocumentFetcher(options.timeoutMs),
        visitedDocuments: new Set<string>(),
        visitedSchemas: new Set<string>(),
        registry: new ComponentRegistry()
    };
}
