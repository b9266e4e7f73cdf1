import builtinTypeNames from "./xsdBuiltinTypes.json";
import { XML_SCHEMA_NS } from "../xml/namespaces";
import { qualifiedNameKey } from "./XsdTypes";
import type { QualifiedName, XmlSchemaFragment, XsdElement, XsdPrimitiveType, XsdType } from "./XsdTypes";

const BUILTIN_TYPE_NAMES: ReadonlySet<string> = new Set(builtinTypeNames);

/**
 * The schema universe of one conversion: every fragment gathered from inline
 * WSDL types and their includes/imports, indexed for global element and type
 * lookup by qualified name. The first definition of a name wins.
 */
export class XmlSchemaStore {
    private readonly fragments = new Map<string, XmlSchemaFragment>();
    private readonly elementMap = new Map<string, XsdElement>();
    private readonly typeMap = new Map<string, XsdType>();
    private readonly primitiveTypes = new Map<string, XsdPrimitiveType>();

    has(location: string): boolean {
        return this.fragments.has(location);
    }

    add(fragment: XmlSchemaFragment): void {
        if (this.fragments.has(fragment.location)) {
            return;
        }
        this.fragments.set(fragment.location, fragment);

        fragment.elements.forEach((element) => {
            const key = qualifiedNameKey({ namespace: element.namespace, name: element.name });
            if (!this.elementMap.has(key)) {
                this.elementMap.set(key, element);
            }
        });
        fragment.types.forEach((type) => {
            if (!type.qualifiedName) {
                return;
            }
            const key = qualifiedNameKey(type.qualifiedName);
            if (!this.typeMap.has(key)) {
                this.typeMap.set(key, type);
            }
        });
    }

    getFragments(): XmlSchemaFragment[] {
        return Array.from(this.fragments.values());
    }

    findGlobalElement(qName: QualifiedName): XsdElement | undefined {
        return this.elementMap.get(qualifiedNameKey(qName));
    }

    /**
     * Finds a global type by qualified name, falling back to the XML Schema
     * built-ins. Returns undefined when neither knows the name.
     */
    resolveType(qName: QualifiedName): XsdType | undefined {
        const declared = this.typeMap.get(qualifiedNameKey(qName));
        if (declared) {
            return declared;
        }
        if (qName.namespace === XML_SCHEMA_NS && BUILTIN_TYPE_NAMES.has(qName.name)) {
            return this.getPrimitiveType(qName.name);
        }
        return undefined;
    }

    resolveElementType(element: XsdElement): XsdType | undefined {
        return this.resolveElementTypeWithin(element, new Set<XsdElement>());
    }

    private resolveElementTypeWithin(element: XsdElement, seen: Set<XsdElement>): XsdType | undefined {
        if (element.inlineType) {
            return element.inlineType;
        }
        if (element.typeName) {
            return this.resolveType(element.typeName);
        }
        if (element.ref && !seen.has(element)) {
            seen.add(element);
            const target = this.findGlobalElement(element.ref);
            return target ? this.resolveElementTypeWithin(target, seen) : undefined;
        }
        return undefined;
    }

    private getPrimitiveType(name: string): XsdPrimitiveType {
        let primitive = this.primitiveTypes.get(name);
        if (!primitive) {
            primitive = { kind: "primitive", qualifiedName: { namespace: XML_SCHEMA_NS, name } };
            this.primitiveTypes.set(name, primitive);
        }
        return primitive;
    }
}
