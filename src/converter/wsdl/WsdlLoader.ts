import type { Document, Element } from "@xmldom/xmldom";
import type { ConversionContext } from "../ConversionContext";
import { DocumentLoadError } from "../conversionErrors";
import { resolveLocation } from "../pathUtils";
import { childElements, getNonEmptyAttribute } from "../xml/domUtils";
import { WSDL_11_NS } from "../xml/namespaces";
import { parseXmlDocument, requireDocumentElement } from "../xml/XmlDocumentParser";
import { WsdlParser } from "./WsdlParser";
import type { WsdlParseResult, WsdlResource } from "./WsdlTypes";

/**
 * Walks the `wsdl:import` graph depth first, loading each location once.
 * Any document that cannot be fetched or parsed aborts the walk.
 */
export class WsdlLoader {
    constructor(private readonly context: ConversionContext) {}

    async load(rootLocation: URL): Promise<WsdlResource[]> {
        const resources: WsdlResource[] = [];
        await this.collectRecursive(rootLocation, resources);
        return resources;
    }

    private async collectRecursive(location: URL, resources: WsdlResource[]): Promise<void> {
        const { visitedDocuments } = this.context;
        if (visitedDocuments.has(location.href)) {
            return;
        }
        visitedDocuments.add(location.href);

        const document = await this.loadDocument(location);
        resources.push({ location, document });

        const root = requireDocumentElement(document, location.href);
        for (const importLocation of this.extractImports(root)) {
            let target: URL;
            try {
                target = resolveLocation(importLocation, location);
            } catch (error) {
                throw new DocumentLoadError(importLocation, error);
            }
            await this.collectRecursive(target, resources);
        }
    }

    private async loadDocument(location: URL): Promise<Document> {
        try {
            const content = await this.context.fetcher.fetchText(location);
            const document = parseXmlDocument(content);
            const root = requireDocumentElement(document, location.href);
            if (root.namespaceURI !== WSDL_11_NS || root.localName !== "definitions") {
                throw new Error("root element is not a WSDL 1.1 definitions element");
            }
            return document;
        } catch (error) {
            throw new DocumentLoadError(location.href, error);
        }
    }

    private extractImports(root: Element): string[] {
        return childElements(root, WSDL_11_NS, "import")
            .map((element) => getNonEmptyAttribute(element, "location"))
            .filter((location): location is string => location !== undefined);
    }
}

/**
 * Loads the root WSDL and everything it imports, then merges them into one
 * definition plus the inline schemas of every document.
 */
export async function mergeInterfaceDocuments(
    rootLocation: URL,
    context: ConversionContext
): Promise<WsdlParseResult> {
    const resources = await new WsdlLoader(context).load(rootLocation);
    console.log("[WsdlLoader] Loaded", resources.length, "WSDL document(s) from", rootLocation.href);
    return new WsdlParser().parse(resources);
}
