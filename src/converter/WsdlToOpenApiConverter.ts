import { createConversionContext } from "./ConversionContext";
import type { ConversionOptions } from "./ConversionContext";
import { DocumentLoadError } from "./conversionErrors";
import { OpenApiOperationBuilder } from "./openapi/OpenApiOperationBuilder";
import { OpenApiSchemaGenerator } from "./openapi/OpenApiSchemaGenerator";
import { serializeOpenApiDocument } from "./openapi/OpenApiSerializer";
import type { OutputFormat } from "./openapi/OpenApiSerializer";
import type { OpenApiDocument } from "./openapi/OpenApiTypes";
import { toSourceLocation } from "./pathUtils";
import { mergeInterfaceDocuments } from "./wsdl/WsdlLoader";
import { resolveSchemaIncludesAndImports } from "./xsd/XsdSchemaLoader";

const DEFAULT_TITLE = "wsdl-conversion";
const DEFAULT_VERSION = "1.0.0";

/**
 * Entry point of the conversion pipeline. Each call runs with a fresh
 * context, so one converter can be reused for any number of locations.
 */
export class WsdlToOpenApiConverter {
    constructor(private readonly options: ConversionOptions = {}) {}

    async convert(location: string | URL): Promise<OpenApiDocument> {
        const context = createConversionContext(this.options);
        const rootLocation = this.toRootLocation(location);

        const { definitions, schemasByBase } = await mergeInterfaceDocuments(rootLocation, context);
        const store = await resolveSchemaIncludesAndImports(schemasByBase, context);

        const generator = new OpenApiSchemaGenerator(store, context.registry);
        const paths = new OpenApiOperationBuilder(definitions, store, generator).buildPaths();

        console.log(
            "[WsdlToOpenApiConverter] Converted",
            rootLocation.href,
            "-",
            Object.keys(paths).length,
            "path(s),",
            context.registry.size,
            "component(s)"
        );

        return {
            openapi: "3.0.3",
            info: {
                title: definitions.name ?? DEFAULT_TITLE,
                version: DEFAULT_VERSION
            },
            paths,
            components: {
                schemas: context.registry.getSchemas()
            }
        };
    }

    private toRootLocation(location: string | URL): URL {
        if (location instanceof URL) {
            return location;
        }
        try {
            return toSourceLocation(location);
        } catch (error) {
            throw new DocumentLoadError(location, error);
        }
    }
}

export async function generateOpenApiFromWsdl(
    location: string | URL,
    format: OutputFormat = "json",
    options: ConversionOptions = {}
): Promise<string> {
    const document = await new WsdlToOpenApiConverter(options).convert(location);
    return serializeOpenApiDocument(document, format);
}
