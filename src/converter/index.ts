export { createConversionContext } from "./ConversionContext";
export type { ConversionContext, ConversionOptions } from "./ConversionContext";
export { ConfigurationError, DocumentLoadError, describeError } from "./conversionErrors";
export { DEFAULT_FETCH_TIMEOUT_MS, DefaultDocumentFetcher } from "./DocumentFetcher";
export type { DocumentFetcher } from "./DocumentFetcher";
export { ComponentRegistry } from "./openapi/ComponentRegistry";
export { OpenApiOperationBuilder } from "./openapi/OpenApiOperationBuilder";
export type { BuiltOperation } from "./openapi/OpenApiOperationBuilder";
export { OpenApiSchemaGenerator } from "./openapi/OpenApiSchemaGenerator";
export { OUTPUT_FORMATS, isOutputFormat, serializeOpenApiDocument } from "./openapi/OpenApiSerializer";
export type { OutputFormat } from "./openapi/OpenApiSerializer";
export * from "./openapi/OpenApiTypes";
export { deriveOutputName, resolveLocation, sanitizePathSegment, toSourceLocation } from "./pathUtils";
export { WsdlLoader, mergeInterfaceDocuments } from "./wsdl/WsdlLoader";
export { WsdlParser } from "./wsdl/WsdlParser";
export type * from "./wsdl/WsdlTypes";
export { WsdlToOpenApiConverter, generateOpenApiFromWsdl } from "./WsdlToOpenApiConverter";
export { XmlSchemaStore } from "./xsd/XmlSchemaStore";
export { XsdSchemaLoader, resolveSchemaIncludesAndImports } from "./xsd/XsdSchemaLoader";
export { XsdSchemaReader } from "./xsd/XsdSchemaReader";
export type * from "./xsd/XsdTypes";
export { isSimpleType, isStructuredType, qualifiedNameKey } from "./xsd/XsdTypes";
