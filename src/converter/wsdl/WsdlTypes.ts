import type { Document, Element } from "@xmldom/xmldom";
import type { QualifiedName } from "../xsd/XsdTypes";

export interface WsdlResource {
    location: URL;
    document: Document;
}

export interface WsdlMessagePart {
    name?: string;
    element?: QualifiedName;
    type?: QualifiedName;
}

export interface WsdlMessage {
    name: string;
    namespace?: string;
    parts: WsdlMessagePart[];
}

export interface WsdlOperation {
    name: string;
    documentation?: string;
    input?: QualifiedName;
    output?: QualifiedName;
}

export interface WsdlPortType {
    name: string;
    operations: WsdlOperation[];
}

export interface WsdlBinding {
    name: string;
    type?: QualifiedName;
    operations: string[];
}

export interface WsdlEndpoint {
    name?: string;
    binding?: QualifiedName;
    address?: string;
}

export interface WsdlService {
    name: string;
    endpoints: WsdlEndpoint[];
}

/** The root WSDL with every imported document merged in. */
export interface WsdlDefinitions {
    name?: string;
    targetNamespace?: string;
    messages: WsdlMessage[];
    portTypes: WsdlPortType[];
    bindings: WsdlBinding[];
    services: WsdlService[];
}

export interface WsdlSchemaEntry {
    key: string;
    baseLocation: URL;
    element: Element;
}

export interface WsdlParseResult {
    definitions: WsdlDefinitions;
    /** Inline schemas grouped by the location of the WSDL holding them. */
    schemasByBase: Map<string, WsdlSchemaEntry[]>;
}
