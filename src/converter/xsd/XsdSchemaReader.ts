import type { Element } from "@xmldom/xmldom";
import {
    childElements,
    findFirstChildElement,
    forEachChildElement,
    getNonEmptyAttribute,
    resolveQualifiedName
} from "../xml/domUtils";
import { XML_SCHEMA_NS } from "../xml/namespaces";
import type {
    QualifiedName,
    XmlSchemaFragment,
    XsdElement,
    XsdSchemaReference,
    XsdStructuredType,
    XsdType
} from "./XsdTypes";

export interface SchemaSource {
    location: string;
    baseLocation: URL;
    /** Namespace adopted by a schema without its own targetNamespace (chameleon include). */
    chameleonNamespace?: string;
}

const PARTICLE_NAMES: ReadonlySet<string> = new Set(["element", "any", "sequence", "choice", "group"]);

interface ParticleContent {
    elements: XsdElement[];
    particleCount: number;
}

interface ReadScope {
    targetNamespace?: string;
    /** Namespace for unprefixed references when no default namespace is declared. */
    unqualifiedNamespace?: string;
}

/**
 * Reads an `xs:schema` element into the structural model used by the
 * converter. Only sequence, choice, simple content and complex content
 * extension are modelled; any other complex type content reads as an empty
 * sequence.
 */
export class XsdSchemaReader {
    read(schemaElement: Element, source: SchemaSource): XmlSchemaFragment {
        const ownNamespace = getNonEmptyAttribute(schemaElement, "targetNamespace");
        const scope: ReadScope = {
            targetNamespace: ownNamespace ?? source.chameleonNamespace,
            unqualifiedNamespace: ownNamespace ? undefined : source.chameleonNamespace
        };

        const fragment: XmlSchemaFragment = {
            location: source.location,
            baseLocation: source.baseLocation,
            targetNamespace: scope.targetNamespace,
            elements: [],
            types: [],
            references: []
        };

        forEachChildElement(schemaElement, (child) => {
            if (child.namespaceURI !== XML_SCHEMA_NS) {
                return;
            }
            switch (child.localName) {
                case "element": {
                    const element = this.readElement(child, scope, true);
                    if (element) {
                        fragment.elements.push(element);
                    }
                    break;
                }
                case "complexType":
                case "simpleType": {
                    const name = getNonEmptyAttribute(child, "name");
                    if (name) {
                        const qualifiedName = { namespace: scope.targetNamespace, name };
                        fragment.types.push(
                            child.localName === "complexType"
                                ? this.readComplexType(child, scope, qualifiedName)
                                : this.readSimpleType(child, scope, qualifiedName)
                        );
                    }
                    break;
                }
                case "include":
                case "import": {
                    const reference = this.readReference(child);
                    if (reference) {
                        fragment.references.push(reference);
                    }
                    break;
                }
                default:
                    break;
            }
        });

        return fragment;
    }

    private readReference(element: Element): XsdSchemaReference | undefined {
        const schemaLocation = getNonEmptyAttribute(element, "schemaLocation");
        if (!schemaLocation) {
            return undefined;
        }
        return {
            kind: element.localName === "include" ? "include" : "import",
            schemaLocation,
            namespace: getNonEmptyAttribute(element, "namespace")
        };
    }

    private readElement(element: Element, scope: ReadScope, global: boolean): XsdElement | undefined {
        const ref = this.resolveName(element, element.getAttribute("ref"), scope);
        const name = getNonEmptyAttribute(element, "name") ?? ref?.name;
        if (!name) {
            return undefined;
        }

        const result: XsdElement = {
            name,
            namespace: global ? scope.targetNamespace : undefined,
            minOccurs: this.readOccurs(element.getAttribute("minOccurs")),
            maxOccurs: this.readOccurs(element.getAttribute("maxOccurs"))
        };

        if (ref) {
            result.ref = ref;
            return result;
        }

        const typeName = this.resolveName(element, element.getAttribute("type"), scope);
        if (typeName) {
            result.typeName = typeName;
            return result;
        }

        const complexType = findFirstChildElement(element, XML_SCHEMA_NS, "complexType");
        if (complexType) {
            result.inlineType = this.readComplexType(complexType, scope);
            return result;
        }

        const simpleType = findFirstChildElement(element, XML_SCHEMA_NS, "simpleType");
        if (simpleType) {
            result.inlineType = this.readSimpleType(simpleType, scope);
        }
        return result;
    }

    private readComplexType(complexType: Element, scope: ReadScope, qualifiedName?: QualifiedName): XsdType {
        const simpleContent = findFirstChildElement(complexType, XML_SCHEMA_NS, "simpleContent");
        if (simpleContent) {
            const derivation =
                findFirstChildElement(simpleContent, XML_SCHEMA_NS, "extension") ??
                findFirstChildElement(simpleContent, XML_SCHEMA_NS, "restriction");
            return {
                kind: "simple",
                qualifiedName,
                base: derivation ? this.resolveName(derivation, derivation.getAttribute("base"), scope) : undefined,
                enumeration: derivation ? this.readEnumeration(derivation) : []
            };
        }

        const complexContent = findFirstChildElement(complexType, XML_SCHEMA_NS, "complexContent");
        if (complexContent) {
            const extension = findFirstChildElement(complexContent, XML_SCHEMA_NS, "extension");
            if (extension) {
                const sequence = findFirstChildElement(extension, XML_SCHEMA_NS, "sequence");
                return {
                    kind: "extension",
                    qualifiedName,
                    base: this.resolveName(extension, extension.getAttribute("base"), scope),
                    ...(sequence ? this.readParticles(sequence, scope) : { elements: [], particleCount: 0 })
                };
            }
            return this.emptyStructure(qualifiedName);
        }

        const sequence = findFirstChildElement(complexType, XML_SCHEMA_NS, "sequence");
        if (sequence) {
            return { kind: "sequence", qualifiedName, ...this.readParticles(sequence, scope) };
        }

        const choice = findFirstChildElement(complexType, XML_SCHEMA_NS, "choice");
        if (choice) {
            return { kind: "choice", qualifiedName, ...this.readParticles(choice, scope) };
        }

        return this.emptyStructure(qualifiedName);
    }

    private readSimpleType(simpleType: Element, scope: ReadScope, qualifiedName?: QualifiedName): XsdType {
        const restriction = findFirstChildElement(simpleType, XML_SCHEMA_NS, "restriction");
        if (!restriction) {
            // list and union types have no single base to map through
            return { kind: "simple", qualifiedName, enumeration: [] };
        }
        return {
            kind: "simple",
            qualifiedName,
            base: this.resolveName(restriction, restriction.getAttribute("base"), scope),
            enumeration: this.readEnumeration(restriction)
        };
    }

    private readParticles(group: Element, scope: ReadScope): ParticleContent {
        const content: ParticleContent = { elements: [], particleCount: 0 };
        forEachChildElement(group, (child) => {
            if (child.namespaceURI !== XML_SCHEMA_NS || !PARTICLE_NAMES.has(child.localName ?? "")) {
                return;
            }
            content.particleCount++;
            if (child.localName === "element") {
                const element = this.readElement(child, scope, false);
                if (element) {
                    content.elements.push(element);
                }
            }
        });
        return content;
    }

    private readEnumeration(derivation: Element): string[] {
        return childElements(derivation, XML_SCHEMA_NS, "enumeration")
            .map((facet) => facet.getAttribute("value"))
            .filter((value): value is string => value !== null);
    }

    private readOccurs(value: string | null): number {
        const trimmed = value?.trim();
        if (!trimmed) {
            return 1;
        }
        if (trimmed === "unbounded") {
            return Number.POSITIVE_INFINITY;
        }
        const parsed = Number.parseInt(trimmed, 10);
        return Number.isNaN(parsed) ? 1 : parsed;
    }

    private resolveName(element: Element, value: string | null, scope: ReadScope): QualifiedName | undefined {
        return resolveQualifiedName(element, value, scope.unqualifiedNamespace);
    }

    private emptyStructure(qualifiedName?: QualifiedName): XsdStructuredType {
        return { kind: "sequence", qualifiedName, elements: [], particleCount: 0 };
    }
}
