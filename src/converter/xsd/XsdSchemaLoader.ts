import type { ConversionContext } from "../ConversionContext";
import { describeError } from "../conversionErrors";
import { resolveLocation } from "../pathUtils";
import type { WsdlSchemaEntry } from "../wsdl/WsdlTypes";
import { XML_SCHEMA_NS } from "../xml/namespaces";
import { parseXmlDocument, requireDocumentElement } from "../xml/XmlDocumentParser";
import { XmlSchemaStore } from "./XmlSchemaStore";
import { XsdSchemaReader } from "./XsdSchemaReader";
import type { XmlSchemaFragment, XsdSchemaReference } from "./XsdTypes";

/**
 * Adds schema fragments to a store and follows their `xs:include` and
 * `xs:import` schemaLocations, each resolved against the location of the
 * fragment that declares it. A fragment that cannot be loaded is skipped with
 * a warning.
 */
export class XsdSchemaLoader {
    private readonly reader = new XsdSchemaReader();

    constructor(
        private readonly context: ConversionContext,
        private readonly store: XmlSchemaStore = new XmlSchemaStore()
    ) {}

    getStore(): XmlSchemaStore {
        return this.store;
    }

    async addInlineSchema(entry: WsdlSchemaEntry): Promise<void> {
        const fragment = this.reader.read(entry.element, {
            location: entry.key,
            baseLocation: entry.baseLocation
        });
        await this.addSchemaAndResolveReferences(fragment);
    }

    private async addSchemaAndResolveReferences(fragment: XmlSchemaFragment): Promise<void> {
        const { visitedSchemas } = this.context;
        if (visitedSchemas.has(fragment.location)) {
            return;
        }
        visitedSchemas.add(fragment.location);
        this.store.add(fragment);

        for (const reference of fragment.references) {
            const referenced = await this.loadReferencedFragment(reference, fragment);
            if (referenced) {
                await this.addSchemaAndResolveReferences(referenced);
            }
        }
    }

    private async loadReferencedFragment(
        reference: XsdSchemaReference,
        owner: XmlSchemaFragment
    ): Promise<XmlSchemaFragment | undefined> {
        let location: URL | undefined;
        try {
            location = resolveLocation(reference.schemaLocation, owner.baseLocation);
            if (this.context.visitedSchemas.has(location.href)) {
                return undefined;
            }
            const content = await this.context.fetcher.fetchText(location);
            const root = requireDocumentElement(parseXmlDocument(content), location.href);
            if (root.namespaceURI !== XML_SCHEMA_NS || root.localName !== "schema") {
                throw new Error("root element is not an XML Schema schema element");
            }
            return this.reader.read(root, {
                location: location.href,
                baseLocation: location,
                chameleonNamespace: reference.kind === "include" ? owner.targetNamespace : undefined
            });
        } catch (error) {
            if (location) {
                this.context.visitedSchemas.add(location.href);
            }
            console.warn(
                "[XsdSchemaLoader] Skipping schema",
                location?.href ?? reference.schemaLocation,
                "referenced from",
                owner.location,
                "-",
                describeError(error)
            );
            return undefined;
        }
    }
}

/**
 * Builds the schema universe from the inline schemas of every merged WSDL
 * document and everything they include or import.
 */
export async function resolveSchemaIncludesAndImports(
    schemasByBase: Map<string, WsdlSchemaEntry[]>,
    context: ConversionContext
): Promise<XmlSchemaStore> {
    const loader = new XsdSchemaLoader(context);
    for (const entries of schemasByBase.values()) {
        for (const entry of entries) {
            await loader.addInlineSchema(entry);
        }
    }
    return loader.getStore();
}
