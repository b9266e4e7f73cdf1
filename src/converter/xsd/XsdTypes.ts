export interface QualifiedName {
    namespace?: string;
    name: string;
}

/**
 * An element declaration: a global element, or a particle inside a
 * sequence/choice. Exactly one of `typeName`, `inlineType` or `ref` is
 * normally present; none means the element has no declared type.
 */
export interface XsdElement {
    name: string;
    namespace?: string;
    typeName?: QualifiedName;
    inlineType?: XsdType;
    ref?: QualifiedName;
    minOccurs: number;
    maxOccurs: number;
}

/** A built-in XML Schema type such as `xs:string`. */
export interface XsdPrimitiveType {
    kind: "primitive";
    qualifiedName: QualifiedName;
}

/** A schema-declared simple type, or a complex type with simple content. */
export interface XsdSimpleType {
    kind: "simple";
    qualifiedName?: QualifiedName;
    base?: QualifiedName;
    enumeration: string[];
}

export interface XsdSequenceType {
    kind: "sequence";
    qualifiedName?: QualifiedName;
    elements: XsdElement[];
    /** Every particle of the group, `xs:any` and nested groups included. */
    particleCount: number;
}

export interface XsdChoiceType {
    kind: "choice";
    qualifiedName?: QualifiedName;
    elements: XsdElement[];
    /** Every particle of the group, `xs:any` and nested groups included. */
    particleCount: number;
}

/** Complex content extension: the base type plus the extension's own sequence. */
export interface XsdExtensionType {
    kind: "extension";
    qualifiedName?: QualifiedName;
    base?: QualifiedName;
    elements: XsdElement[];
    particleCount: number;
}

export type XsdStructuredType = XsdSequenceType | XsdChoiceType | XsdExtensionType;

export type XsdType = XsdPrimitiveType | XsdSimpleType | XsdStructuredType;

export interface XsdSchemaReference {
    kind: "include" | "import";
    schemaLocation: string;
    namespace?: string;
}

export interface XmlSchemaFragment {
    /** Identity of the fragment: its own URL, or a key derived from the WSDL holding it inline. */
    location: string;
    baseLocation: URL;
    targetNamespace?: string;
    elements: XsdElement[];
    types: XsdType[];
    references: XsdSchemaReference[];
}

export function qualifiedNameKey(qName: QualifiedName): string {
    return `${qName.namespace ?? ""}#${qName.name}`;
}

export function isStructuredType(type: XsdType | undefined): type is XsdStructuredType {
    return type !== undefined && type.kind !== "primitive" && type.kind !== "simple";
}

/** Unknown types count as simple so callers always fall back to a string schema. */
export function isSimpleType(type: XsdType | undefined): boolean {
    return !isStructuredType(type);
}
