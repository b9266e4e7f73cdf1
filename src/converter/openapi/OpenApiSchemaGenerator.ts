import { XML_SCHEMA_NS } from "../xml/namespaces";
import type { XmlSchemaStore } from "../xsd/XmlSchemaStore";
import { isStructuredType } from "../xsd/XsdTypes";
import type { QualifiedName, XsdElement, XsdSimpleType, XsdStructuredType, XsdType } from "../xsd/XsdTypes";
import type { ComponentRegistry } from "./ComponentRegistry";
import { arrayOf, componentRef, setOwnProperty } from "./OpenApiTypes";
import type { SchemaObject } from "./OpenApiTypes";

const PRIMITIVE_SCHEMAS: Readonly<Record<string, Readonly<SchemaObject>>> = {
    string: { type: "string" },
    normalizedString: { type: "string" },
    boolean: { type: "boolean" },
    int: { type: "integer", format: "int32" },
    integer: { type: "integer", format: "int32" },
    short: { type: "integer", format: "int32" },
    byte: { type: "integer", format: "int32" },
    long: { type: "integer", format: "int64" },
    decimal: { type: "number" },
    double: { type: "number" },
    float: { type: "number" },
    dateTime: { type: "string", format: "date-time" },
    date: { type: "string", format: "date" },
    base64Binary: { type: "string", format: "byte" }
};

/**
 * Turns resolved XSD types into OpenAPI schemas. Simple types map to inline
 * primitives, wrapper types (a single child element) collapse into arrays and
 * every other structured type becomes a named component in the registry.
 */
export class OpenApiSchemaGenerator {
    private readonly unwrapping = new Set<XsdStructuredType>();

    constructor(
        private readonly store: XmlSchemaStore,
        private readonly registry: ComponentRegistry
    ) {}

    synthesizeSchema(type: XsdType | undefined): SchemaObject {
        if (!isStructuredType(type)) {
            return this.mapSimpleType(type);
        }

        const wrapped = this.getSingleSequenceChild(type);
        if (wrapped && !this.unwrapping.has(type)) {
            const innerType = this.store.resolveElementType(wrapped);
            if (innerType) {
                this.unwrapping.add(type);
                try {
                    return arrayOf(this.synthesizeSchema(innerType));
                } finally {
                    this.unwrapping.delete(type);
                }
            }
        }

        return componentRef(this.ensureComponent(type));
    }

    /**
     * Returns the component name for a structured type, building the
     * component the first time. The name is registered before the children
     * are expanded so recursive types refer back to it.
     */
    ensureComponent(type: XsdStructuredType): string {
        const existing = this.registry.lookup(type);
        if (existing) {
            return existing;
        }

        const properties: Record<string, SchemaObject> = {};
        const name = this.registry.register(type, { type: "object", properties });

        switch (type.kind) {
            case "extension":
                this.addBaseReference(type.base, properties);
                break;
            case "sequence":
            case "choice":
                break;
            default: {
                const unexpected: never = type;
                throw new Error(`Unsupported structured type: ${JSON.stringify(unexpected)}`);
            }
        }
        type.elements.forEach((child) => this.addPropertyForChild(child, properties));

        return name;
    }

    /**
     * Maps a simple type to an inline schema. Declared simple types follow
     * their base chain to the first built-in; anything unknown is a string.
     */
    mapSimpleType(type: XsdType | undefined): SchemaObject {
        return this.mapSimpleTypeWithin(type, new Set<XsdSimpleType>());
    }

    /** The only child element of a wrapper type: a sequence holding one particle, an element. */
    getSingleSequenceChild(type: XsdStructuredType): XsdElement | undefined {
        if (type.kind === "choice" || type.particleCount !== 1 || type.elements.length !== 1) {
            return undefined;
        }
        return type.elements[0];
    }

    private addBaseReference(
        base: QualifiedName | undefined,
        properties: Record<string, SchemaObject>
    ): void {
        if (!base) {
            return;
        }
        const baseType = this.store.resolveType(base);
        if (isStructuredType(baseType)) {
            setOwnProperty(properties, `_extends_${base.name}`, componentRef(this.ensureComponent(baseType)));
        }
    }

    private addPropertyForChild(child: XsdElement, properties: Record<string, SchemaObject>): void {
        const childType = this.store.resolveElementType(child);
        const schema = isStructuredType(childType)
            ? componentRef(this.ensureComponent(childType))
            : this.mapSimpleType(childType);
        setOwnProperty(properties, child.name, child.maxOccurs > 1 ? arrayOf(schema) : schema);
    }

    private mapSimpleTypeWithin(type: XsdType | undefined, seen: Set<XsdSimpleType>): SchemaObject {
        if (!type) {
            return { type: "string" };
        }
        switch (type.kind) {
            case "primitive":
                return this.mapBuiltin(type.qualifiedName.namespace, type.qualifiedName.name);
            case "simple": {
                if (seen.has(type) || !type.base) {
                    return this.withEnumeration({ type: "string" }, type);
                }
                seen.add(type);
                const schema = this.mapSimpleTypeWithin(this.store.resolveType(type.base), seen);
                return this.withEnumeration(schema, type);
            }
            case "sequence":
            case "choice":
            case "extension":
                return { type: "string" };
        }
    }

    private mapBuiltin(namespace: string | undefined, name: string): SchemaObject {
        const primitive =
            namespace === XML_SCHEMA_NS && Object.hasOwn(PRIMITIVE_SCHEMAS, name) ? PRIMITIVE_SCHEMAS[name] : undefined;
        return primitive ? { ...primitive } : { type: "string" };
    }

    private withEnumeration(schema: SchemaObject, type: XsdSimpleType): SchemaObject {
        if (type.enumeration.length === 0 || schema.type !== "string") {
            return schema;
        }
        return { ...schema, enum: [...type.enumeration] };
    }
}
