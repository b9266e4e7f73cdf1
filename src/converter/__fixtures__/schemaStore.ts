import { parseXmlDocument, requireDocumentElement } from "../xml/XmlDocumentParser";
import { XmlSchemaStore } from "../xsd/XmlSchemaStore";
import { XsdSchemaReader } from "../xsd/XsdSchemaReader";
import type { QualifiedName, XsdStructuredType } from "../xsd/XsdTypes";
import { isStructuredType } from "../xsd/XsdTypes";
import { schemaDocument } from "./documents";

export const TEST_NS = "urn:test";

/** Builds a store from one schema in the `urn:test` namespace. */
export function storeFromSchema(body: string): XmlSchemaStore {
  const location = "http://example.test/schema.xsd";
  const root = requireDocumentElement(parseXmlDocument(schemaDocument(body)), location);
  const store = new XmlSchemaStore();
  store.add(new XsdSchemaReader().read(root, { location, baseLocation: new URL(location) }));
  return store;
}

export function testName(name: string): QualifiedName {
  return { namespace: TEST_NS, name };
}

export function structuredType(store: XmlSchemaStore, name: string): XsdStructuredType {
  const type = store.resolveType(testName(name));
  if (!isStructuredType(type)) {
    throw new Error(`${name} is not a structured type`);
  }
  return type;
}
