import { qualifiedNameKey } from "../xsd/XsdTypes";
import type { XsdStructuredType } from "../xsd/XsdTypes";
import { setOwnProperty } from "./OpenApiTypes";
import type { SchemaObject } from "./OpenApiTypes";

/**
 * Maps structured XSD types to component names and holds the component
 * schemas. Named types are keyed by qualified name, anonymous ones by
 * identity. Entries are never removed.
 */
export class ComponentRegistry {
    private readonly namesByKey = new Map<string, string>();
    private readonly anonymousNames = new Map<XsdStructuredType, string>();
    private readonly schemas: Record<string, SchemaObject> = {};

    get size(): number {
        return this.namesByKey.size + this.anonymousNames.size;
    }

    lookup(type: XsdStructuredType): string | undefined {
        return type.qualifiedName
            ? this.namesByKey.get(qualifiedNameKey(type.qualifiedName))
            : this.anonymousNames.get(type);
    }

    /**
     * Assigns a component name to a type that is not registered yet and
     * stores `schema` under it. Anonymous types are named `AnonType_<n>`
     * where n is the number of components registered before them.
     */
    register(type: XsdStructuredType, schema: SchemaObject): string {
        const baseName = type.qualifiedName?.name || `AnonType_${this.size}`;
        let name = baseName;
        let index = 1;
        while (Object.hasOwn(this.schemas, name)) {
            name = `${baseName}_${index++}`;
        }

        if (type.qualifiedName) {
            this.namesByKey.set(qualifiedNameKey(type.qualifiedName), name);
        } else {
            this.anonymousNames.set(type, name);
        }
        setOwnProperty(this.schemas, name, schema);
        return name;
    }

    getSchemas(): Record<string, SchemaObject> {
        return this.schemas;
    }
}
